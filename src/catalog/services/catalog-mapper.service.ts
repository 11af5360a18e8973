import { Injectable } from '@nestjs/common';
import {
  CatalogMappingResult,
  CatalogSnapshot,
} from '../interfaces/catalog.interface';
import { AppLoggerService } from '../../common/logger/app-logger.service';

@Injectable()
export class CatalogMapperService {
  constructor(private readonly appLogger: AppLoggerService) {}

  /**
   * 코드별 설명을 찾습니다. 카탈로그를 사용할 수 없어도 예외 없이 빈 설명을 반환합니다
   */
  mapDescriptions(
    codes: readonly string[],
    snapshot: CatalogSnapshot,
    reportType = 'unknown',
  ): CatalogMappingResult {
    const uniqueCodes = [...new Set(codes)].filter((code) => code !== '');
    const descriptions = new Map<string, string>();
    let mappedCount = 0;

    for (const code of uniqueCodes) {
      const description =
        snapshot.status === 'available' ? snapshot.index.lookup(code) : undefined;

      if (description) {
        mappedCount++;
      }
      descriptions.set(code, description ?? '');
    }

    const summary = {
      mappedCount,
      unmappedCount: uniqueCodes.length - mappedCount,
      totalCount: uniqueCodes.length,
    };

    this.appLogger.logCatalogMapping({
      reportType,
      catalogStatus: snapshot.status,
      totalCodes: summary.totalCount,
      mappedCount: summary.mappedCount,
      unmappedCount: summary.unmappedCount,
    });

    if (snapshot.status === 'unavailable') {
      return {
        descriptions,
        summary,
        diagnostic: { reason: snapshot.reason, totalCodes: uniqueCodes.length },
      };
    }

    return { descriptions, summary };
  }
}
