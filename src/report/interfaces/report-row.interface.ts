/**
 * 헤더 행들의 비어있지 않은 조각을 순서대로 이어 붙인 복합 컬럼 키
 * 예: ['Original Budget', 'Total']
 */
export type ColumnKey = readonly string[];

export type RowKind = 'summary' | 'leaf';

export interface RawRow {
  /** 헤더를 제외한 데이터 행 번호 (1부터 시작) */
  readonly rowNumber: number;
  /** 원본 파일의 줄 번호 (HTML은 표의 행 순서) */
  readonly line: number;
  readonly values: readonly string[];
}

export interface ParsedExport {
  readonly columns: readonly ColumnKey[];
  readonly rows: readonly RawRow[];
  readonly encodingAnomalies: number;
  readonly skippedRows: readonly string[];
}

export interface FormattedAmount {
  readonly value: number | null;
  readonly display: string;
  readonly fallback: boolean;
}

export interface TextCell {
  readonly role: 'code' | 'text';
  readonly column: ColumnKey;
  readonly raw: string;
}

export interface NumericCell {
  readonly role: 'numeric';
  readonly column: ColumnKey;
  readonly raw: string;
  readonly amount: FormattedAmount;
}

export type OutputCell = TextCell | NumericCell;

export interface OutputRow {
  readonly serialNo: number;
  readonly rowNumber: number;
  readonly line: number;
  readonly code: string;
  readonly level: string;
  /** Object 컬럼에 함께 들어있던 설명 */
  readonly detail: string;
  /** 카탈로그에서 찾은 설명 (없으면 빈 문자열) */
  readonly description: string;
  readonly rowKind: RowKind | null;
  readonly cells: readonly OutputCell[];
}

export function columnKeyEquals(a: ColumnKey, b: ColumnKey): boolean {
  return a.length === b.length && a.every((fragment, i) => fragment === b[i]);
}

export function columnKeyLabel(key: ColumnKey): string {
  return key.join(' / ');
}
