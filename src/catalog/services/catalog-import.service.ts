import {
  Injectable,
  Logger,
  BadRequestException,
  NotFoundException,
  InternalServerErrorException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, DataSource } from 'typeorm';
import { validate, ValidationError } from 'class-validator';
import { plainToClass } from 'class-transformer';
import * as XLSX from 'xlsx';
import { existsSync, readFileSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import { CatalogEntry } from '../entities/catalog-entry.entity';
import { CatalogRowDto } from '../dto/catalog-row.dto';
import {
  CatalogImportResult,
  CatalogStatusReport,
} from '../interfaces/catalog.interface';
import { CatalogSessionService } from './catalog-session.service';
import { AppLoggerService } from '../../common/logger/app-logger.service';

export const CODE_HEADER = 'WBS_element';
export const NAME_HEADER = 'Name';

const INSERT_CHUNK_SIZE = 500;
const SAMPLE_SIZE = 5;

export interface ParsedCatalogWorkbook {
  rows: CatalogRowDto[];
  rowsRead: number;
  skipped: number;
  duplicates: number;
  errors: string[];
}

@Injectable()
export class CatalogImportService {
  private readonly logger = new Logger(CatalogImportService.name);

  constructor(
    @InjectRepository(CatalogEntry)
    private readonly catalogRepository: Repository<CatalogEntry>,
    private readonly dataSource: DataSource,
    private readonly catalogSession: CatalogSessionService,
    private readonly appLogger: AppLoggerService,
  ) {}

  /**
   * 마스터 카탈로그 파일을 읽어 wbs_elements 테이블을 교체하고 색인을 다시 불러옵니다
   */
  async importFromFile(filePath?: string): Promise<CatalogImportResult> {
    const path = filePath
      ? resolve(filePath)
      : this.catalogSession.masterFilePath;
    const fileName = basename(path);

    if (!existsSync(path)) {
      throw new NotFoundException(`Master catalog file not found: ${path}`);
    }

    const startTime = Date.now();
    const parsed = await this.parseWorkbook(readFileSync(path));

    if (parsed.rows.length === 0) {
      throw new BadRequestException(
        'Master catalog file contains no valid rows',
      );
    }

    try {
      await this.replaceEntries(parsed.rows);
    } catch (error) {
      this.appLogger.logCatalogImport({
        fileName,
        rowsRead: parsed.rowsRead,
        imported: 0,
        skipped: parsed.skipped,
        status: 'FAILED',
        durationMs: Date.now() - startTime,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      throw new InternalServerErrorException(
        'Failed to import master catalog',
      );
    }

    await this.catalogSession.reload();

    const result: CatalogImportResult = {
      fileName,
      rowsRead: parsed.rowsRead,
      imported: parsed.rows.length,
      skipped: parsed.skipped,
      duplicates: parsed.duplicates,
      errors: parsed.errors,
      durationMs: Date.now() - startTime,
    };

    this.appLogger.logCatalogImport({
      fileName,
      rowsRead: result.rowsRead,
      imported: result.imported,
      skipped: result.skipped,
      status: 'SUCCESS',
      durationMs: result.durationMs,
    });

    return result;
  }

  /**
   * 워크북 첫 시트에서 WBS_element, Name 컬럼을 읽습니다
   */
  async parseWorkbook(buffer: Buffer): Promise<ParsedCatalogWorkbook> {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;

    if (!sheet) {
      throw new BadRequestException('Master catalog workbook has no sheets');
    }

    const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: '',
      raw: false,
    });
    const header = (table[0] ?? []).map((cell) => String(cell).trim());
    const codeIndex = header.indexOf(CODE_HEADER);
    const nameIndex = header.indexOf(NAME_HEADER);

    if (codeIndex === -1 || nameIndex === -1) {
      throw new BadRequestException(
        `Master catalog file must contain ${CODE_HEADER} and ${NAME_HEADER} columns`,
      );
    }

    const byCode = new Map<string, CatalogRowDto>();
    const errors: string[] = [];
    let skipped = 0;
    let duplicates = 0;
    const dataRows = table.slice(1);

    for (let i = 0; i < dataRows.length; i++) {
      const row = plainToClass(CatalogRowDto, {
        wbs_element: String(dataRows[i][codeIndex] ?? ''),
        name: String(dataRows[i][nameIndex] ?? ''),
      });

      if (!row.wbs_element || !row.name) {
        skipped++;
        continue;
      }

      const validationErrors = await validate(row);
      if (validationErrors.length > 0) {
        // 헤더가 1행이므로 데이터는 2행부터
        const errorMessage = `Row ${i + 2}: ${this.formatValidationErrors(validationErrors).join(', ')}`;
        errors.push(errorMessage);
        this.logger.warn(errorMessage);
        skipped++;
        continue;
      }

      if (byCode.has(row.wbs_element)) {
        duplicates++;
      }
      byCode.set(row.wbs_element, row);
    }

    return {
      rows: [...byCode.values()],
      rowsRead: dataRows.length,
      skipped,
      duplicates,
      errors,
    };
  }

  /**
   * 카탈로그 상태 보고서를 생성합니다
   */
  async getStatusReport(): Promise<CatalogStatusReport> {
    const path = this.catalogSession.masterFilePath;
    const exists = existsSync(path);

    let recordCount: number | null = null;
    let samples: CatalogStatusReport['samples'] = [];
    try {
      recordCount = await this.catalogRepository.count();
      const entries = await this.catalogRepository.find({
        order: { wbs_element: 'ASC' },
        take: SAMPLE_SIZE,
      });
      samples = entries.map((entry) => ({
        code: entry.wbs_element,
        description: entry.name,
      }));
    } catch (error) {
      this.logger.error(
        `Failed to read catalog table: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const snapshot = await this.catalogSession.ensureChecked();

    return {
      masterFile: {
        path,
        exists,
        sizeBytes: exists ? statSync(path).size : null,
      },
      recordCount,
      samples,
      state: snapshot.status,
      ...(snapshot.status === 'available'
        ? {
            loadedAt: snapshot.index.loadedAt.toISOString(),
            indexSize: snapshot.index.size,
          }
        : { reason: snapshot.reason }),
      recommendation: this.recommend(exists, recordCount),
    };
  }

  private recommend(fileExists: boolean, recordCount: number | null): string {
    if (recordCount === null) {
      return 'Check the database connection settings';
    }
    if (recordCount > 0) {
      return 'Catalog is ready';
    }
    if (fileExists) {
      return 'Run POST /api/v1/catalog/import to load the master catalog';
    }
    return `Place the master catalog workbook at ${this.catalogSession.masterFilePath} and run the import`;
  }

  private async replaceEntries(rows: CatalogRowDto[]): Promise<void> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();
    const startTime = Date.now();

    try {
      await queryRunner.query('DELETE FROM wbs_elements');

      for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
        const chunk = rows.slice(i, i + INSERT_CHUNK_SIZE).map((row) => ({
          wbs_element: row.wbs_element,
          name: row.name,
        }));
        await queryRunner.manager.insert(CatalogEntry, chunk);
      }

      await queryRunner.commitTransaction();
      this.appLogger.logDatabaseOperation(
        'REPLACE',
        'wbs_elements',
        rows.length,
        Date.now() - startTime,
      );
    } catch (error) {
      await queryRunner.rollbackTransaction();
      this.logger.error('Failed to replace catalog entries', error);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * 검증 에러를 포맷팅합니다
   */
  private formatValidationErrors(errors: ValidationError[]): string[] {
    const messages: string[] = [];

    for (const error of errors) {
      if (error.constraints) {
        messages.push(...Object.values(error.constraints).map(String));
      }

      if (error.children && error.children.length > 0) {
        messages.push(...this.formatValidationErrors(error.children));
      }
    }

    return messages;
  }
}
