import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { validateSync, ValidationError } from 'class-validator';
import { plainToClass } from 'class-transformer';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import {
  ReportProfileDto,
  ReportProfilesFileDto,
} from '../dto/report-profile.dto';
import {
  ReportProfile,
  ReportProfileSummary,
} from '../interfaces/report-profile.interface';

export const DEFAULT_PROFILES_PATH = 'config/report-profiles.json';

@Injectable()
export class ReportProfileService {
  private readonly logger = new Logger(ReportProfileService.name);
  private readonly profiles = new Map<string, ReportProfile>();

  constructor(private readonly configService: ConfigService) {
    const profilesPath = resolve(
      this.configService.get<string>(
        'REPORT_PROFILES_PATH',
        DEFAULT_PROFILES_PATH,
      ),
    );
    const fileContent = readFileSync(profilesPath, 'utf-8');

    for (const profile of this.parseProfilesFile(fileContent)) {
      this.profiles.set(profile.reportType, profile);
    }

    this.logger.log(
      `Loaded ${this.profiles.size} report profiles from ${profilesPath}`,
    );
  }

  /**
   * 리포트 유형에 해당하는 프로파일을 반환합니다
   */
  getProfile(reportType: string): ReportProfile {
    const profile = this.profiles.get(reportType);
    if (!profile) {
      throw new NotFoundException(`Unknown report type: ${reportType}`);
    }
    return profile;
  }

  listReportTypes(): ReportProfileSummary[] {
    return [...this.profiles.values()].map((profile) => ({
      reportType: profile.reportType,
      label: profile.label,
      format: profile.format,
    }));
  }

  /**
   * 프로파일 JSON을 파싱하고 검증합니다. 잘못된 파일이면 애플리케이션 시작이 실패합니다
   */
  parseProfilesFile(fileContent: string): ReportProfile[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fileContent);
    } catch (error) {
      throw new Error(
        `Invalid JSON format in report profiles file: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const profilesFile = plainToClass(ReportProfilesFileDto, parsed);
    const errors = validateSync(profilesFile);

    if (errors.length > 0) {
      throw new Error(
        `Report profile validation failed: ${this.formatValidationErrors(errors).join(', ')}`,
      );
    }

    this.validateBusinessRules(profilesFile);

    return profilesFile.profiles.map((dto) => this.toProfile(dto));
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

  private validateBusinessRules(profilesFile: ReportProfilesFileDto): void {
    const seen = new Set<string>();

    for (const profile of profilesFile.profiles) {
      if (seen.has(profile.reportType)) {
        throw new Error(`Duplicate report type: ${profile.reportType}`);
      }
      seen.add(profile.reportType);

      if (profile.numericColumns && profile.numericColumnsFrom !== undefined) {
        throw new Error(
          `${profile.reportType}: numericColumns and numericColumnsFrom are mutually exclusive`,
        );
      }

      for (const key of profile.numericColumns ?? []) {
        if (
          key.length === 0 ||
          key.some((fragment) => typeof fragment !== 'string' || !fragment)
        ) {
          throw new Error(
            `${profile.reportType}: numeric column keys must be non-empty string lists`,
          );
        }
      }

      if (profile.codeColumn.some((fragment) => fragment === '')) {
        throw new Error(
          `${profile.reportType}: codeColumn fragments cannot be empty`,
        );
      }
    }
  }

  private toProfile(dto: ReportProfileDto): ReportProfile {
    return {
      reportType: dto.reportType,
      label: dto.label ?? dto.reportType,
      format: dto.format,
      encoding: dto.encoding ?? (dto.format === 'html' ? 'utf-8' : 'latin1'),
      delimiter: dto.delimiter ?? '\t',
      discardLineIndices: [...dto.discardLineIndices],
      headerRowCount: dto.headerRowCount,
      dropTrailingRows: dto.dropTrailingRows ?? 0,
      codeColumn: [...dto.codeColumn],
      codeSource: dto.codeSource ?? 'plain',
      numericColumns: dto.numericColumns
        ? dto.numericColumns.map((key) => [...key])
        : null,
      numericColumnsFrom: dto.numericColumnsFrom ?? null,
    };
  }
}
