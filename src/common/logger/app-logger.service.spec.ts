import { Test, TestingModule } from '@nestjs/testing';
import {
  AppLoggerService,
  CatalogImportLogData,
  CatalogMappingLogData,
  DiagnosticEvent,
  ReportProcessingLogData,
} from './app-logger.service';

describe('AppLoggerService', () => {
  let service: AppLoggerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AppLoggerService],
    }).compile();

    service = module.get<AppLoggerService>(AppLoggerService);

    // 로그 출력을 모킹하여 테스트 중 콘솔 출력 방지
    jest.spyOn(service, 'log').mockImplementation();
    jest.spyOn(service, 'error').mockImplementation();
    jest.spyOn(service, 'warn').mockImplementation();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('리포트 처리 로그', () => {
    it('리포트 처리 결과를 로그해야 함', () => {
      const logData: ReportProcessingLogData = {
        reportType: 'budget_report',
        fileName: 'budget.dat',
        totalRows: 120,
        totalCodes: 95,
        skippedRows: 2,
        processingTimeMs: 35,
      };

      service.logReportProcessing(logData);

      expect(service.log).toHaveBeenCalledWith(
        'Report Processing - Type: budget_report, File: budget.dat, Rows: 120, Codes: 95, Skipped: 2, Processing Time: 35ms',
      );
    });

    it('파일명이 없으면 생략해야 함', () => {
      service.logReportProcessing({
        reportType: 'budget_updates',
        totalRows: 1,
        totalCodes: 1,
        skippedRows: 0,
        processingTimeMs: 3,
      });

      expect(service.log).toHaveBeenCalledWith(
        'Report Processing - Type: budget_updates, Rows: 1, Codes: 1, Skipped: 0, Processing Time: 3ms',
      );
    });
  });

  describe('카탈로그 매핑 로그', () => {
    const baseData: CatalogMappingLogData = {
      reportType: 'budget_report',
      catalogStatus: 'available',
      totalCodes: 100,
      mappedCount: 85,
      unmappedCount: 15,
    };

    it('매핑 결과를 로그해야 함', () => {
      service.logCatalogMapping(baseData);

      expect(service.log).toHaveBeenCalledWith(
        'Catalog Mapping - Type: budget_report, Catalog: available, Total: 100, Mapped: 85, Unmapped: 15',
      );
      expect(service.warn).not.toHaveBeenCalled();
    });

    it('매핑률이 80% 미만이면 경고 로그를 남겨야 함', () => {
      service.logCatalogMapping({
        ...baseData,
        mappedCount: 70,
        unmappedCount: 30,
      });

      expect(service.warn).toHaveBeenCalledWith(
        'Low catalog mapping rate: 70.00% for report budget_report',
      );
    });

    it('카탈로그를 사용할 수 없으면 매핑률 경고를 남기지 않아야 함', () => {
      service.logCatalogMapping({
        ...baseData,
        catalogStatus: 'unavailable',
        mappedCount: 0,
        unmappedCount: 100,
      });

      expect(service.warn).not.toHaveBeenCalled();
    });
  });

  describe('카탈로그 가져오기 로그', () => {
    const logData: CatalogImportLogData = {
      fileName: 'WBS_NAMES.xlsx',
      rowsRead: 10,
      imported: 9,
      skipped: 1,
      status: 'SUCCESS',
      durationMs: 42,
    };

    it('성공한 가져오기를 로그해야 함', () => {
      service.logCatalogImport(logData);

      expect(service.log).toHaveBeenCalledWith(
        'Catalog Import - File: WBS_NAMES.xlsx, Read: 10, Imported: 9, Skipped: 1, Status: SUCCESS, Duration: 42ms',
      );
    });

    it('실패한 가져오기를 에러로 로그해야 함', () => {
      service.logCatalogImport({
        ...logData,
        imported: 0,
        status: 'FAILED',
        errorMessage: 'Deadlock found',
      });

      expect(service.error).toHaveBeenCalledWith(
        expect.stringContaining('Status: FAILED, Duration: 42ms, Error: Deadlock found'),
      );
    });
  });

  describe('진단 이벤트 로그', () => {
    it('카탈로그 미사용 이벤트는 경고로 로그해야 함', () => {
      service.logDiagnosticEvent({
        event: DiagnosticEvent.CATALOG_UNAVAILABLE,
        details: 'not-imported',
      });

      expect(service.warn).toHaveBeenCalledWith(
        'Diagnostic Event - CATALOG_UNAVAILABLE, Details: not-imported',
      );
    });

    it('형식 대체 이벤트는 일반 로그로 남겨야 함', () => {
      service.logDiagnosticEvent({
        event: DiagnosticEvent.FORMAT_FALLBACK,
        reportType: 'budget_variance',
        count: 3,
      });

      expect(service.log).toHaveBeenCalledWith(
        'Diagnostic Event - FORMAT_FALLBACK, Type: budget_variance, Count: 3',
      );
    });
  });

  describe('데이터베이스 작업 로그', () => {
    it('데이터베이스 작업을 로그해야 함', () => {
      service.logDatabaseOperation('INSERT', 'wbs_elements', 250, 120);

      expect(service.log).toHaveBeenCalledWith(
        'Database INSERT - Table: wbs_elements, Records: 250, Duration: 120ms',
      );
    });
  });
});
