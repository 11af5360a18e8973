import { Injectable } from '@nestjs/common';

export interface ClassificationResult {
  /** 하위 코드가 하나 이상 존재하는 코드 */
  summary: string[];
  /** 하위 코드가 없는 코드 */
  leaf: string[];
}

const CHILD_SUFFIX = /^(.*)-[0-9]{2}$/;
const ESCAPE_PATTERN = /[.*+?^${}()|[\]\\]/g;

/**
 * 계층형 코드를 summary/leaf로 분류합니다.
 * 하위 코드 = 상위 코드 + '-' + 두 자리 숫자
 */
@Injectable()
export class CodeHierarchyService {
  classify(codes: readonly string[]): ClassificationResult {
    const unique = this.distinct(codes);
    const present = new Set(unique);
    const parents = new Set<string>();

    for (const code of unique) {
      const match = CHILD_SUFFIX.exec(code);
      if (match && match[1] !== code && present.has(match[1])) {
        parents.add(match[1]);
      }
    }

    return this.partition(unique, (code) => parents.has(code));
  }

  /**
   * 모든 쌍을 비교하는 기준 구현. classify 결과 검증용
   */
  classifyNaive(codes: readonly string[]): ClassificationResult {
    const unique = this.distinct(codes);

    return this.partition(unique, (candidate) => {
      const childPattern = new RegExp(
        `^${candidate.replace(ESCAPE_PATTERN, '\\$&')}-[0-9]{2}$`,
      );
      return unique.some(
        (other) => other !== candidate && childPattern.test(other),
      );
    });
  }

  private distinct(codes: readonly string[]): string[] {
    return [...new Set(codes)];
  }

  private partition(
    codes: string[],
    isSummary: (code: string) => boolean,
  ): ClassificationResult {
    const result: ClassificationResult = { summary: [], leaf: [] };
    for (const code of codes) {
      (isSummary(code) ? result.summary : result.leaf).push(code);
    }
    return result;
  }
}
