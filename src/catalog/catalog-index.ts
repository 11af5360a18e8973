/**
 * 코드 -> 설명 조회용 불변 색인. 다시 불러올 때는 새 인스턴스를 만듭니다
 */
export class CatalogIndex {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(
    entries: Iterable<readonly [string, string]>,
    readonly loadedAt: Date = new Date(),
  ) {
    this.entries = new Map(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(code: string): string | undefined {
    return this.entries.get(code);
  }
}
