import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { CatalogEntry } from '../entities/catalog-entry.entity';
import { CatalogIndex } from '../catalog-index';
import {
  CatalogSnapshot,
  CatalogState,
} from '../interfaces/catalog.interface';
import {
  AppLoggerService,
  DiagnosticEvent,
} from '../../common/logger/app-logger.service';

export const DEFAULT_MASTER_CATALOG_FILE = 'data/WBS_NAMES.xlsx';

/**
 * 참조 카탈로그의 사용 가능 여부를 세션당 한 번 확인하고 색인을 보관합니다
 */
@Injectable()
export class CatalogSessionService {
  private readonly logger = new Logger(CatalogSessionService.name);
  private state: CatalogState = { status: 'not-loaded' };
  private pendingCheck: Promise<CatalogSnapshot> | null = null;

  constructor(
    @InjectRepository(CatalogEntry)
    private readonly catalogRepository: Repository<CatalogEntry>,
    private readonly configService: ConfigService,
    private readonly appLogger: AppLoggerService,
  ) {}

  get masterFilePath(): string {
    return resolve(
      this.configService.get<string>(
        'MASTER_CATALOG_FILE',
        DEFAULT_MASTER_CATALOG_FILE,
      ),
    );
  }

  /**
   * 마지막으로 확정된 상태를 반환합니다. 다시 확인하지 않습니다
   */
  getStatus(): CatalogState {
    return this.state;
  }

  /**
   * 아직 확인하지 않았다면 확인을 시작합니다. 동시에 호출한 쪽은 같은 확인 결과를 공유합니다
   */
  ensureChecked(): Promise<CatalogSnapshot> {
    const current = this.state;
    if (current.status === 'available' || current.status === 'unavailable') {
      return Promise.resolve(current);
    }

    if (!this.pendingCheck) {
      this.state = { status: 'checking' };
      this.pendingCheck = this.check().then((snapshot) => {
        // 확인 중에 reload가 끝났다면 그 결과를 유지
        if (this.state.status === 'checking') {
          this.state = snapshot;
        }
        return snapshot;
      });
    }

    return this.pendingCheck;
  }

  /**
   * 테이블에서 색인을 새로 만들고 참조를 한 번에 교체합니다
   */
  async reload(): Promise<CatalogSnapshot> {
    const snapshot = await this.check();
    const current = this.state;

    // 읽기 실패 시 기존 색인 유지
    if (
      current.status === 'available' &&
      snapshot.status === 'unavailable' &&
      snapshot.reason === 'load-failed'
    ) {
      this.logger.warn(
        `Catalog reload failed, keeping the index loaded at ${current.index.loadedAt.toISOString()}: ${snapshot.detail ?? 'unknown error'}`,
      );
      return current;
    }

    this.state = snapshot;
    this.pendingCheck = Promise.resolve(snapshot);
    return snapshot;
  }

  private async check(): Promise<CatalogSnapshot> {
    try {
      const count = await this.catalogRepository.count();

      if (count > 0) {
        const entries = await this.catalogRepository.find({
          select: { wbs_element: true, name: true },
        });
        const index = new CatalogIndex(
          entries.map((entry): [string, string] => [
            entry.wbs_element,
            entry.name,
          ]),
        );

        this.logger.log(`Catalog index loaded with ${index.size} entries`);
        return { status: 'available', index };
      }

      const reason = existsSync(this.masterFilePath)
        ? 'not-imported'
        : 'source-missing';
      this.appLogger.logDiagnosticEvent({
        event: DiagnosticEvent.CATALOG_UNAVAILABLE,
        details: `${reason} (${this.masterFilePath})`,
      });
      return { status: 'unavailable', reason };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Catalog availability check failed: ${message}`);
      this.appLogger.logDiagnosticEvent({
        event: DiagnosticEvent.CATALOG_UNAVAILABLE,
        details: `load-failed (${message})`,
      });
      return { status: 'unavailable', reason: 'load-failed', detail: message };
    }
  }
}
