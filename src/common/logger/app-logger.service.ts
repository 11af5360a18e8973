import { Injectable, Logger } from '@nestjs/common';

export interface ReportProcessingLogData {
  reportType: string;
  fileName?: string;
  totalRows: number;
  totalCodes: number;
  skippedRows: number;
  processingTimeMs: number;
}

export interface CatalogMappingLogData {
  reportType: string;
  catalogStatus: 'available' | 'unavailable';
  totalCodes: number;
  mappedCount: number;
  unmappedCount: number;
}

export interface CatalogImportLogData {
  fileName: string;
  rowsRead: number;
  imported: number;
  skipped: number;
  status: 'SUCCESS' | 'FAILED';
  durationMs: number;
  errorMessage?: string;
}

export interface DiagnosticLogData {
  event: DiagnosticEvent;
  reportType?: string;
  count?: number;
  details?: string;
}

export const enum DiagnosticEvent {
  ENCODING_ANOMALY = 'ENCODING_ANOMALY',
  FORMAT_FALLBACK = 'FORMAT_FALLBACK',
  ROWS_SKIPPED = 'ROWS_SKIPPED',
  CATALOG_UNAVAILABLE = 'CATALOG_UNAVAILABLE',
}

@Injectable()
export class AppLoggerService extends Logger {
  constructor() {
    super('AppLogger');
  }

  /**
   * 리포트 처리 결과 로그 기록
   */
  logReportProcessing(data: ReportProcessingLogData): void {
    const fileInfo = data.fileName ? `, File: ${data.fileName}` : '';
    this.log(
      `Report Processing - Type: ${data.reportType}${fileInfo}, Rows: ${data.totalRows}, Codes: ${data.totalCodes}, Skipped: ${data.skippedRows}, Processing Time: ${data.processingTimeMs}ms`,
    );
  }

  /**
   * 카탈로그 매핑 결과 로그 기록
   */
  logCatalogMapping(data: CatalogMappingLogData): void {
    this.log(
      `Catalog Mapping - Type: ${data.reportType}, Catalog: ${data.catalogStatus}, Total: ${data.totalCodes}, Mapped: ${data.mappedCount}, Unmapped: ${data.unmappedCount}`,
    );

    // 매핑률이 낮은 경우 경고 로그
    if (data.catalogStatus === 'available' && data.totalCodes > 0) {
      const mappingRate = (data.mappedCount / data.totalCodes) * 100;
      if (mappingRate < 80) {
        this.warn(
          `Low catalog mapping rate: ${mappingRate.toFixed(2)}% for report ${data.reportType}`,
        );
      }
    }
  }

  /**
   * 마스터 카탈로그 가져오기 로그 기록
   */
  logCatalogImport(data: CatalogImportLogData): void {
    const logMessage = `Catalog Import - File: ${data.fileName}, Read: ${data.rowsRead}, Imported: ${data.imported}, Skipped: ${data.skipped}, Status: ${data.status}, Duration: ${data.durationMs}ms`;

    if (data.status === 'SUCCESS') {
      this.log(logMessage);
    } else {
      this.error(`${logMessage}, Error: ${data.errorMessage || 'Unknown error'}`);
    }
  }

  /**
   * 처리를 중단하지 않는 진단 이벤트 로그 기록
   */
  logDiagnosticEvent(data: DiagnosticLogData): void {
    const parts = [`Diagnostic Event - ${data.event}`];
    if (data.reportType) {
      parts.push(`Type: ${data.reportType}`);
    }
    if (data.count !== undefined) {
      parts.push(`Count: ${data.count}`);
    }
    if (data.details) {
      parts.push(`Details: ${data.details}`);
    }

    switch (data.event) {
      case DiagnosticEvent.CATALOG_UNAVAILABLE:
      case DiagnosticEvent.ROWS_SKIPPED:
      case DiagnosticEvent.ENCODING_ANOMALY:
        this.warn(parts.join(', '));
        break;
      default:
        this.log(parts.join(', '));
    }
  }

  /**
   * 데이터베이스 작업 로그 기록
   */
  logDatabaseOperation(
    operation: string,
    table: string,
    recordCount: number,
    durationMs: number,
  ): void {
    this.log(
      `Database ${operation} - Table: ${table}, Records: ${recordCount}, Duration: ${durationMs}ms`,
    );
  }
}
