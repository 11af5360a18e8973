import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { NotFoundException } from '@nestjs/common';
import { ReportAssemblerService } from './report-assembler.service';
import { ReportProfileService } from './report-profile.service';
import { ExportReaderService } from './export-reader.service';
import { CodeHierarchyService } from './code-hierarchy.service';
import { CurrencyFormatterService } from './currency-formatter.service';
import { ReportProfile } from '../interfaces/report-profile.interface';
import { ReportParseError } from '../errors/report-parse.error';
import { CatalogSessionService } from '../../catalog/services/catalog-session.service';
import { CatalogMapperService } from '../../catalog/services/catalog-mapper.service';
import { CatalogIndex } from '../../catalog/catalog-index';
import { AppLoggerService } from '../../common/logger/app-logger.service';

describe('ReportAssemblerService', () => {
  let service: ReportAssemblerService;
  let reportProfileService: { getProfile: jest.Mock };
  let catalogSession: { ensureChecked: jest.Mock };
  let appLogger: {
    logReportProcessing: jest.Mock;
    logCatalogMapping: jest.Mock;
    logDiagnosticEvent: jest.Mock;
  };

  const profile: ReportProfile = {
    reportType: 'budget_report',
    label: 'Budget Report',
    format: 'delimited',
    encoding: 'latin1',
    delimiter: '\t',
    discardLineIndices: [0, 1, 4, -1],
    headerRowCount: 2,
    dropTrailingRows: 0,
    codeColumn: ['Object'],
    codeSource: 'trailing-token',
    numericColumns: null,
    numericColumnsFrom: 1,
  };

  const exportFile = Buffer.from(
    [
      'Budget Report',
      'Project: NL',
      '\tOriginal Budget\tActual',
      'Object\tTotal\tCumulative',
      '----',
      '* Mine expansion NL-C-001\t150000.00\t-5000.00',
      '** Pit development NL-C-001-01\t1234567.5\tn/a',
      '* Haul road NL-C-002\t5000\t',
      '\t\t12.00',
      '*** End of report ***',
    ].join('\n'),
    'latin1',
  );

  const availableCatalog = {
    status: 'available',
    index: new CatalogIndex([
      ['NL-C-001', 'Mine expansion'],
      ['NL-C-001-01', 'Pit development'],
    ]),
  };

  beforeEach(async () => {
    reportProfileService = { getProfile: jest.fn().mockReturnValue(profile) };
    catalogSession = {
      ensureChecked: jest.fn().mockResolvedValue(availableCatalog),
    };
    appLogger = {
      logReportProcessing: jest.fn(),
      logCatalogMapping: jest.fn(),
      logDiagnosticEvent: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportAssemblerService,
        ExportReaderService,
        CodeHierarchyService,
        CurrencyFormatterService,
        CatalogMapperService,
        { provide: ReportProfileService, useValue: reportProfileService },
        { provide: CatalogSessionService, useValue: catalogSession },
        { provide: AppLoggerService, useValue: appLogger },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((_key: string, defaultValue?: string) => defaultValue),
          },
        },
      ],
    }).compile();

    service = module.get<ReportAssemblerService>(ReportAssemblerService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should assign column roles from the profile', async () => {
    const report = await service.assemble('budget_report', exportFile);

    expect(report.columns).toEqual([
      { key: ['Object'], label: 'Object', role: 'code' },
      {
        key: ['Original Budget', 'Total'],
        label: 'Original Budget / Total',
        role: 'numeric',
      },
      { key: ['Actual', 'Cumulative'], label: 'Actual / Cumulative', role: 'numeric' },
    ]);
  });

  it('should classify, describe and format every row', async () => {
    const report = await service.assemble('budget_report', exportFile);

    expect(
      report.rows.map((row) => ({
        serialNo: row.serialNo,
        line: row.line,
        code: row.code,
        level: row.level,
        detail: row.detail,
        description: row.description,
        rowKind: row.rowKind,
      })),
    ).toEqual([
      {
        serialNo: 1,
        line: 6,
        code: 'NL-C-001',
        level: '*',
        detail: 'Mine expansion',
        description: 'Mine expansion',
        rowKind: 'summary',
      },
      {
        serialNo: 2,
        line: 7,
        code: 'NL-C-001-01',
        level: '**',
        detail: 'Pit development',
        description: 'Pit development',
        rowKind: 'leaf',
      },
      {
        serialNo: 3,
        line: 8,
        code: 'NL-C-002',
        level: '*',
        detail: 'Haul road',
        description: '',
        rowKind: 'leaf',
      },
      {
        serialNo: 4,
        line: 9,
        code: '',
        level: '',
        detail: '',
        description: '',
        rowKind: null,
      },
    ]);
  });

  it('should format numeric cells and count fallbacks', async () => {
    const report = await service.assemble('budget_report', exportFile);

    expect(report.rows[0].cells).toEqual([
      {
        role: 'code',
        column: ['Object'],
        raw: '* Mine expansion NL-C-001',
      },
      {
        role: 'numeric',
        column: ['Original Budget', 'Total'],
        raw: '150000.00',
        amount: { value: 150000, display: '₹ 1,50,000.00', fallback: false },
      },
      {
        role: 'numeric',
        column: ['Actual', 'Cumulative'],
        raw: '-5000.00',
        amount: { value: -5000, display: '-₹ 5,000.00', fallback: false },
      },
    ]);

    const displays = report.rows.map((row) =>
      row.cells.map((cell) => (cell.role === 'numeric' ? cell.amount.display : cell.raw)),
    );
    expect(displays.slice(1)).toEqual([
      ['** Pit development NL-C-001-01', '₹ 12,34,567.50', '₹ 0.00'],
      ['* Haul road NL-C-002', '₹ 5,000.00', '₹ 0.00'],
      ['', '₹ 0.00', '₹ 12.00'],
    ]);
    expect(report.diagnostics.formatFallbacks).toBe(1);
  });

  it('should produce the diagnostic summary', async () => {
    const report = await service.assemble('budget_report', exportFile, 'b.dat');

    expect(report.diagnostics).toEqual({
      reportType: 'budget_report',
      totalRows: 4,
      totalCodes: 3,
      summaryCount: 1,
      leafCount: 2,
      mappedCount: 2,
      unmappedCount: 1,
      catalogStatus: 'available',
      encodingAnomalies: 0,
      formatFallbacks: 1,
      skippedRows: [],
    });
    expect(appLogger.logReportProcessing).toHaveBeenCalledWith(
      expect.objectContaining({
        reportType: 'budget_report',
        fileName: 'b.dat',
        totalRows: 4,
        totalCodes: 3,
        skippedRows: 0,
      }),
    );
  });

  it('should degrade to blank descriptions when the catalog is unavailable', async () => {
    catalogSession.ensureChecked.mockResolvedValue({
      status: 'unavailable',
      reason: 'not-imported',
    });

    const report = await service.assemble('budget_report', exportFile);

    expect(report.rows.map((row) => row.description)).toEqual(['', '', '', '']);
    expect(report.rows.map((row) => row.rowKind)).toEqual([
      'summary',
      'leaf',
      'leaf',
      null,
    ]);
    expect(report.diagnostics).toEqual(
      expect.objectContaining({
        mappedCount: 0,
        unmappedCount: 3,
        catalogStatus: 'unavailable',
        catalogReason: 'not-imported',
      }),
    );
  });

  it('should take the catalog snapshot once per file', async () => {
    await service.assemble('budget_report', exportFile);

    expect(catalogSession.ensureChecked).toHaveBeenCalledTimes(1);
  });

  it('should leave rows unclassified when the code column is missing', async () => {
    reportProfileService.getProfile.mockReturnValue({
      ...profile,
      codeColumn: ['WBS Element'],
    });

    const report = await service.assemble('budget_report', exportFile);

    expect(report.columns[0].role).toBe('text');
    expect(report.rows.every((row) => row.rowKind === null)).toBe(true);
    expect(report.diagnostics.totalCodes).toBe(0);
  });

  it('should abort the file on a parse error before touching the catalog', async () => {
    const promise = service.assemble(
      'budget_report',
      Buffer.from('a\nb\n\n\nsep\nfooter\n', 'latin1'),
    );

    await expect(promise).rejects.toThrow(ReportParseError);
    expect(catalogSession.ensureChecked).not.toHaveBeenCalled();
  });

  it('should propagate unknown report types', async () => {
    reportProfileService.getProfile.mockImplementation(() => {
      throw new NotFoundException('Unknown report type: foo');
    });

    await expect(service.assemble('foo', exportFile)).rejects.toThrow(
      NotFoundException,
    );
  });
});
