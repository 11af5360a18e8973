import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { CatalogImportService } from './services/catalog-import.service';
import { CatalogSessionService } from './services/catalog-session.service';
import {
  CatalogImportResult,
  CatalogStatusReport,
} from './interfaces/catalog.interface';

export interface CatalogReloadResponse {
  status: 'available' | 'unavailable';
  reason?: string;
  indexSize?: number;
}

@ApiTags('catalog')
@Controller('api/v1/catalog')
export class CatalogController {
  constructor(
    private readonly catalogImportService: CatalogImportService,
    private readonly catalogSession: CatalogSessionService,
  ) {}

  @ApiOperation({
    summary: '카탈로그 상태 조회',
    description:
      '마스터 파일 존재 여부, 테이블 레코드 수, 샘플 항목, 현재 상태와 권장 조치를 반환합니다.',
  })
  @ApiResponse({ status: 200, description: '카탈로그 상태 보고서' })
  @Get('status')
  getStatus(): Promise<CatalogStatusReport> {
    return this.catalogImportService.getStatusReport();
  }

  @ApiOperation({
    summary: '마스터 카탈로그 가져오기',
    description:
      'MASTER_CATALOG_FILE 워크북을 읽어 wbs_elements 테이블을 교체하고 색인을 다시 불러옵니다.',
  })
  @ApiResponse({ status: 200, description: '가져오기 결과' })
  @Post('import')
  @HttpCode(HttpStatus.OK)
  importCatalog(): Promise<CatalogImportResult> {
    return this.catalogImportService.importFromFile();
  }

  @ApiOperation({
    summary: '카탈로그 색인 다시 불러오기',
    description: '테이블에서 색인을 새로 만들어 교체합니다.',
  })
  @ApiResponse({ status: 200, description: '다시 불러온 뒤의 상태' })
  @Post('reload')
  @HttpCode(HttpStatus.OK)
  async reload(): Promise<CatalogReloadResponse> {
    const snapshot = await this.catalogSession.reload();

    return snapshot.status === 'available'
      ? { status: snapshot.status, indexSize: snapshot.index.size }
      : { status: snapshot.status, reason: snapshot.reason };
  }
}
