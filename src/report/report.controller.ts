import {
  BadRequestException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiConsumes,
  ApiBody,
  ApiParam,
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { reportUploadOptions } from '../file/multer.config';
import {
  AssembledReport,
  ReportAssemblerService,
} from './services/report-assembler.service';
import { ReportProfileService } from './services/report-profile.service';
import { ReportProfileSummary } from './interfaces/report-profile.interface';

@ApiTags('reports')
@Controller('api/v1/reports')
export class ReportController {
  private readonly logger = new Logger(ReportController.name);

  constructor(
    private readonly reportAssemblerService: ReportAssemblerService,
    private readonly reportProfileService: ReportProfileService,
  ) {}

  @ApiOperation({
    summary: '리포트 유형 목록 조회',
    description: '설정 파일에 등록된 리포트 프로파일 목록을 반환합니다.',
  })
  @ApiResponse({ status: 200, description: '리포트 유형 목록' })
  @Get('profiles')
  listProfiles(): ReportProfileSummary[] {
    return this.reportProfileService.listReportTypes();
  }

  @ApiOperation({
    summary: '내보내기 파일 처리',
    description:
      '내보내기 파일(.dat, .txt, .htm, .html)을 업로드하면 헤더를 결합하고 WBS 코드를 summary/leaf로 분류한 뒤 카탈로그 설명과 금액 서식을 적용한 행을 반환합니다.',
  })
  @ApiParam({
    name: 'reportType',
    description: '리포트 유형',
    example: 'budget_report',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    description: '처리할 내보내기 파일',
    schema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          format: 'binary',
          description: '내보내기 파일',
        },
      },
    },
  })
  @ApiResponse({
    status: 200,
    description: '처리 결과 (columns, rows, diagnostics)',
  })
  @ApiBadRequestResponse({ description: '파일 누락 또는 지원하지 않는 형식' })
  @ApiNotFoundResponse({ description: '알 수 없는 리포트 유형' })
  @ApiUnprocessableEntityResponse({
    description: '정리 후에도 행 구조가 헤더와 맞지 않음',
  })
  @Post(':reportType/process')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file', reportUploadOptions))
  async process(
    @Param('reportType') reportType: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<AssembledReport> {
    if (!file) {
      throw new BadRequestException('An export file is required');
    }

    this.logger.log(
      `Processing ${reportType} export: ${file.originalname} (${file.size} bytes)`,
    );

    return this.reportAssemblerService.assemble(
      reportType,
      file.buffer,
      file.originalname,
    );
  }
}
