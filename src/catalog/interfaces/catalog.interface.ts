import type { CatalogIndex } from '../catalog-index';

export type CatalogUnavailableReason =
  | 'source-missing'
  | 'not-imported'
  | 'load-failed';

export interface CatalogAvailable {
  status: 'available';
  index: CatalogIndex;
}

export interface CatalogUnavailable {
  status: 'unavailable';
  reason: CatalogUnavailableReason;
  detail?: string;
}

/** 확인이 끝난 카탈로그 상태. 요청 하나가 처음부터 끝까지 같은 스냅샷을 사용합니다 */
export type CatalogSnapshot = CatalogAvailable | CatalogUnavailable;

export type CatalogState =
  | { status: 'not-loaded' }
  | { status: 'checking' }
  | CatalogSnapshot;

export interface CatalogMappingSummary {
  mappedCount: number;
  unmappedCount: number;
  totalCount: number;
}

export interface CatalogDiagnostic {
  reason: CatalogUnavailableReason;
  totalCodes: number;
}

export interface CatalogMappingResult {
  /** 코드 -> 설명. 찾지 못한 코드는 빈 문자열 */
  descriptions: ReadonlyMap<string, string>;
  summary: CatalogMappingSummary;
  diagnostic?: CatalogDiagnostic;
}

export interface CatalogImportResult {
  fileName: string;
  rowsRead: number;
  imported: number;
  skipped: number;
  duplicates: number;
  errors: string[];
  durationMs: number;
}

export interface CatalogSampleEntry {
  code: string;
  description: string;
}

export interface CatalogStatusReport {
  masterFile: {
    path: string;
    exists: boolean;
    sizeBytes: number | null;
  };
  recordCount: number | null;
  samples: CatalogSampleEntry[];
  state: CatalogState['status'];
  reason?: CatalogUnavailableReason;
  loadedAt?: string;
  indexSize?: number;
  recommendation: string;
}
