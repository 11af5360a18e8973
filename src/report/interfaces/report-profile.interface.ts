import type {
  CodeSource,
  ExportEncoding,
  ReportFormat,
} from '../dto/report-profile.dto';
import type { ColumnKey } from './report-row.interface';

/**
 * 기본값이 모두 채워진 리포트 프로파일
 */
export interface ReportProfile {
  readonly reportType: string;
  readonly label: string;
  readonly format: ReportFormat;
  readonly encoding: ExportEncoding;
  readonly delimiter: string;
  readonly discardLineIndices: readonly number[];
  readonly headerRowCount: number;
  readonly dropTrailingRows: number;
  readonly codeColumn: ColumnKey;
  readonly codeSource: CodeSource;
  /** 명시적 숫자 컬럼 목록. 없으면 numericColumnsFrom 기준으로 결정 */
  readonly numericColumns: readonly ColumnKey[] | null;
  readonly numericColumnsFrom: number | null;
}

export interface ReportProfileSummary {
  reportType: string;
  label: string;
  format: ReportFormat;
}
