import { UnprocessableEntityException } from '@nestjs/common';

export interface ReportParseErrorContext {
  line?: number;
  expectedColumns?: number;
  actualColumns?: number;
}

/**
 * 정리 프로파일로도 직사각형 행 집합을 만들 수 없을 때 발생합니다.
 * 해당 파일 처리만 중단되며 다른 요청에는 영향이 없습니다.
 */
export class ReportParseError extends UnprocessableEntityException {
  constructor(
    message: string,
    readonly context: ReportParseErrorContext = {},
  ) {
    super({ message, error: 'Unprocessable Entity', ...context });
  }
}
