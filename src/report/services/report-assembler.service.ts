import { Injectable, Logger } from '@nestjs/common';
import { ExportReaderService } from './export-reader.service';
import { ReportProfileService } from './report-profile.service';
import { CodeHierarchyService } from './code-hierarchy.service';
import { CurrencyFormatterService } from './currency-formatter.service';
import { CodeDetail, parseCodeDetail } from '../parsers/code-detail.parser';
import { ReportProfile } from '../interfaces/report-profile.interface';
import {
  ColumnKey,
  OutputCell,
  OutputRow,
  RawRow,
  RowKind,
  columnKeyEquals,
  columnKeyLabel,
} from '../interfaces/report-row.interface';
import { CatalogSessionService } from '../../catalog/services/catalog-session.service';
import { CatalogMapperService } from '../../catalog/services/catalog-mapper.service';
import type { CatalogUnavailableReason } from '../../catalog/interfaces/catalog.interface';
import {
  AppLoggerService,
  DiagnosticEvent,
} from '../../common/logger/app-logger.service';

export interface ReportDiagnostics {
  reportType: string;
  totalRows: number;
  totalCodes: number;
  summaryCount: number;
  leafCount: number;
  mappedCount: number;
  unmappedCount: number;
  catalogStatus: 'available' | 'unavailable';
  catalogReason?: CatalogUnavailableReason;
  encodingAnomalies: number;
  formatFallbacks: number;
  skippedRows: string[];
}

export interface ReportColumn {
  key: ColumnKey;
  label: string;
  role: OutputCell['role'];
}

export interface AssembledReport {
  columns: ReportColumn[];
  rows: OutputRow[];
  diagnostics: ReportDiagnostics;
}

@Injectable()
export class ReportAssemblerService {
  private readonly logger = new Logger(ReportAssemblerService.name);

  constructor(
    private readonly reportProfileService: ReportProfileService,
    private readonly exportReaderService: ExportReaderService,
    private readonly codeHierarchyService: CodeHierarchyService,
    private readonly currencyFormatterService: CurrencyFormatterService,
    private readonly catalogSession: CatalogSessionService,
    private readonly catalogMapper: CatalogMapperService,
    private readonly appLogger: AppLoggerService,
  ) {}

  /**
   * 내보내기 파일 하나를 정리, 분류, 매핑, 서식 적용까지 처리합니다
   */
  async assemble(
    reportType: string,
    buffer: Buffer,
    fileName?: string,
  ): Promise<AssembledReport> {
    const startTime = Date.now();
    const profile = this.reportProfileService.getProfile(reportType);

    const parsed = await this.exportReaderService.read(buffer, profile);

    const codeIndex = parsed.columns.findIndex((key) =>
      columnKeyEquals(key, profile.codeColumn),
    );
    if (codeIndex === -1) {
      this.logger.warn(
        `${reportType}: code column "${columnKeyLabel(profile.codeColumn)}" not found, rows are left unclassified`,
      );
    }

    const roles = parsed.columns.map((key, index) =>
      this.roleOf(key, index, codeIndex, profile),
    );

    const details = parsed.rows.map((row) =>
      this.codeDetailOf(row, codeIndex, profile),
    );
    const codes = [
      ...new Set(details.map((detail) => detail.code).filter(Boolean)),
    ];

    const classification = this.codeHierarchyService.classify(codes);
    const summaryCodes = new Set(classification.summary);

    const snapshot = await this.catalogSession.ensureChecked();
    const mapping = this.catalogMapper.mapDescriptions(
      codes,
      snapshot,
      reportType,
    );

    let formatFallbacks = 0;
    const rows = parsed.rows.map((row, index): OutputRow => {
      const detail = details[index];
      const cells = row.values.map((raw, column): OutputCell => {
        const role = roles[column];
        const key = parsed.columns[column];
        if (role !== 'numeric') {
          return { role, column: key, raw };
        }

        const amount = this.currencyFormatterService.format(raw);
        if (amount.fallback) {
          formatFallbacks++;
        }
        return { role, column: key, raw, amount };
      });

      return {
        serialNo: index + 1,
        rowNumber: row.rowNumber,
        line: row.line,
        code: detail.code,
        level: detail.level,
        detail: detail.detail,
        description: detail.code
          ? (mapping.descriptions.get(detail.code) ?? '')
          : '',
        rowKind: this.rowKindOf(detail.code, summaryCodes),
        cells,
      };
    });

    const diagnostics: ReportDiagnostics = {
      reportType,
      totalRows: rows.length,
      totalCodes: codes.length,
      summaryCount: classification.summary.length,
      leafCount: classification.leaf.length,
      mappedCount: mapping.summary.mappedCount,
      unmappedCount: mapping.summary.unmappedCount,
      catalogStatus: snapshot.status,
      ...(mapping.diagnostic
        ? { catalogReason: mapping.diagnostic.reason }
        : {}),
      encodingAnomalies: parsed.encodingAnomalies,
      formatFallbacks,
      skippedRows: [...parsed.skippedRows],
    };

    this.logDiagnostics(diagnostics);
    this.appLogger.logReportProcessing({
      reportType,
      fileName,
      totalRows: diagnostics.totalRows,
      totalCodes: diagnostics.totalCodes,
      skippedRows: diagnostics.skippedRows.length,
      processingTimeMs: Date.now() - startTime,
    });

    return {
      columns: parsed.columns.map((key, index) => ({
        key,
        label: columnKeyLabel(key),
        role: roles[index],
      })),
      rows,
      diagnostics,
    };
  }

  private roleOf(
    key: ColumnKey,
    index: number,
    codeIndex: number,
    profile: ReportProfile,
  ): OutputCell['role'] {
    if (index === codeIndex) {
      return 'code';
    }
    if (profile.numericColumns) {
      return profile.numericColumns.some((numeric) =>
        columnKeyEquals(numeric, key),
      )
        ? 'numeric'
        : 'text';
    }
    if (
      profile.numericColumnsFrom !== null &&
      index >= profile.numericColumnsFrom
    ) {
      return 'numeric';
    }
    return 'text';
  }

  private codeDetailOf(
    row: RawRow,
    codeIndex: number,
    profile: ReportProfile,
  ): CodeDetail {
    const raw = codeIndex === -1 ? '' : row.values[codeIndex];
    return parseCodeDetail(raw, profile.codeSource);
  }

  private rowKindOf(code: string, summaryCodes: Set<string>): RowKind | null {
    if (!code) {
      return null;
    }
    return summaryCodes.has(code) ? 'summary' : 'leaf';
  }

  private logDiagnostics(diagnostics: ReportDiagnostics): void {
    if (diagnostics.encodingAnomalies > 0) {
      this.appLogger.logDiagnosticEvent({
        event: DiagnosticEvent.ENCODING_ANOMALY,
        reportType: diagnostics.reportType,
        count: diagnostics.encodingAnomalies,
      });
    }
    if (diagnostics.formatFallbacks > 0) {
      this.appLogger.logDiagnosticEvent({
        event: DiagnosticEvent.FORMAT_FALLBACK,
        reportType: diagnostics.reportType,
        count: diagnostics.formatFallbacks,
      });
    }
    if (diagnostics.skippedRows.length > 0) {
      this.appLogger.logDiagnosticEvent({
        event: DiagnosticEvent.ROWS_SKIPPED,
        reportType: diagnostics.reportType,
        count: diagnostics.skippedRows.length,
      });
    }
  }
}
