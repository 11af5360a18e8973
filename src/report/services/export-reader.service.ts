import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'stream';
import csv from 'csv-parser';
import { parse, HTMLElement } from 'node-html-parser';
import { ReportParseError } from '../errors/report-parse.error';
import type { ExportEncoding } from '../dto/report-profile.dto';
import type { ReportProfile } from '../interfaces/report-profile.interface';
import {
  ColumnKey,
  ParsedExport,
  RawRow,
} from '../interfaces/report-row.interface';

export interface DecodedExport {
  text: string;
  encodingAnomalies: number;
}

export interface NumberedLine {
  /** 원본 파일 기준 줄 번호 (1부터 시작) */
  lineNumber: number;
  text: string;
}

interface GridRow {
  line: number;
  values: string[];
}

interface RowSpanCarry {
  value: string;
  rows: number;
}

const REPLACEMENT_CHAR = '\uFFFD';
const UTF8_REPLACEMENT_BYTES = Buffer.from([0xef, 0xbf, 0xbd]);
// 따옴표는 인용 부호가 아닌 값의 일부 (예: 12" pipe)
const NO_QUOTE = '\0';

@Injectable()
export class ExportReaderService {
  private readonly logger = new Logger(ExportReaderService.name);

  /**
   * 내보내기 파일을 정리하고 복합 헤더를 가진 직사각형 행 집합으로 변환합니다
   */
  async read(buffer: Buffer, profile: ReportProfile): Promise<ParsedExport> {
    const { text, encodingAnomalies } = this.decode(buffer, profile.encoding);

    if (encodingAnomalies > 0) {
      this.logger.warn(
        `${profile.reportType}: ${encodingAnomalies} undecodable byte sequences replaced`,
      );
    }

    const rawLines = text.split(/\r?\n/);
    if (rawLines[rawLines.length - 1] === '') {
      rawLines.pop();
    }

    const lines = this.cleanLines(rawLines, profile.discardLineIndices).filter(
      (line) => line.text.trim() !== '',
    );

    if (lines.length === 0) {
      throw new ReportParseError('Export contains no data after cleaning');
    }

    const grid =
      profile.format === 'html'
        ? this.parseHtmlTable(lines.map((line) => line.text).join('\n'))
        : await this.parseDelimited(lines, profile.delimiter);

    if (grid.length < profile.headerRowCount) {
      throw new ReportParseError(
        `Export has fewer than ${profile.headerRowCount} header rows`,
        { line: grid.length > 0 ? grid[grid.length - 1].line : undefined },
      );
    }

    const headerRows = grid.slice(0, profile.headerRowCount);
    const columns = this.combineHeaders(headerRows.map((row) => row.values));
    const { rows, skippedRows } = this.normalizeRows(
      grid.slice(profile.headerRowCount),
      columns.length,
      profile.dropTrailingRows,
    );

    this.logger.log(
      `${profile.reportType}: parsed ${rows.length} rows with ${columns.length} columns`,
    );

    return { columns, rows, encodingAnomalies, skippedRows };
  }

  /**
   * 버퍼를 문자열로 변환합니다. 잘못된 UTF-8 시퀀스는 U+FFFD로 바뀌고 개수가 집계됩니다
   */
  decode(buffer: Buffer, encoding: ExportEncoding): DecodedExport {
    if (encoding === 'latin1') {
      return { text: buffer.toString('latin1'), encodingAnomalies: 0 };
    }

    const text = buffer.toString('utf8').replace(/^\uFEFF/, '');
    const replaced = text.split(REPLACEMENT_CHAR).length - 1;

    const genuine = this.countOccurrences(buffer, UTF8_REPLACEMENT_BYTES);

    return { text, encodingAnomalies: replaced - genuine };
  }

  /**
   * 설정된 인덱스의 줄을 제거합니다. 음수 인덱스는 끝에서부터 계산하고 범위를 벗어난 인덱스는 무시합니다
   */
  cleanLines(
    lines: readonly string[],
    discardLineIndices: readonly number[],
  ): NumberedLine[] {
    const discard = new Set<number>();

    for (const index of discardLineIndices) {
      const resolved = index < 0 ? lines.length + index : index;
      if (resolved >= 0 && resolved < lines.length) {
        discard.add(resolved);
      }
    }

    const cleaned: NumberedLine[] = [];
    lines.forEach((text, index) => {
      if (!discard.has(index)) {
        cleaned.push({ lineNumber: index + 1, text });
      }
    });
    return cleaned;
  }

  /**
   * 헤더 행들의 같은 위치 조각을 이어 붙여 컬럼 키를 만듭니다
   */
  combineHeaders(headerRows: readonly (readonly string[])[]): ColumnKey[] {
    const width = Math.max(0, ...headerRows.map((row) => row.length));
    const columns: ColumnKey[] = [];

    for (let column = 0; column < width; column++) {
      const fragments: string[] = [];
      for (const row of headerRows) {
        const fragment = (row[column] ?? '').trim();
        // rowspan으로 반복된 조각은 한 번만
        if (fragment && fragments[fragments.length - 1] !== fragment) {
          fragments.push(fragment);
        }
      }
      columns.push(fragments.length > 0 ? fragments : [`column_${column + 1}`]);
    }

    return columns;
  }

  private normalizeRows(
    dataRows: GridRow[],
    width: number,
    dropTrailingRows: number,
  ): { rows: RawRow[]; skippedRows: string[] } {
    const nonEmpty = dataRows.filter((row) =>
      row.values.some((value) => value !== ''),
    );
    const kept = nonEmpty.slice(
      0,
      Math.max(0, nonEmpty.length - dropTrailingRows),
    );

    const consistent: GridRow[] = [];
    const inconsistent: GridRow[] = [];

    for (const row of kept) {
      const values = [...row.values];
      while (values.length > width && values[values.length - 1] === '') {
        values.pop();
      }
      while (values.length < width) {
        values.push('');
      }
      (values.length > width ? inconsistent : consistent).push({
        line: row.line,
        values,
      });
    }

    if (inconsistent.length > 0 && inconsistent.length * 2 > kept.length) {
      const first = inconsistent[0];
      throw new ReportParseError(
        `Export rows do not match the header: ${inconsistent.length} of ${kept.length} rows have extra cells`,
        {
          line: first.line,
          expectedColumns: width,
          actualColumns: first.values.length,
        },
      );
    }

    const skippedRows = inconsistent.map(
      (row) =>
        `Line ${row.line}: expected ${width} columns, found ${row.values.length}`,
    );
    for (const message of skippedRows) {
      this.logger.warn(`Row skipped - ${message}`);
    }

    return {
      rows: consistent.map((row, index) => ({
        rowNumber: index + 1,
        line: row.line,
        values: row.values,
      })),
      skippedRows,
    };
  }

  /**
   * 구분자 파일을 csv-parser로 파싱합니다
   */
  private parseDelimited(
    lines: NumberedLine[],
    delimiter: string,
  ): Promise<GridRow[]> {
    return new Promise((resolve, reject) => {
      const rows: GridRow[] = [];
      const stream = Readable.from([lines.map((line) => line.text).join('\n')]);

      stream
        .pipe(
          csv({ headers: false, separator: delimiter, quote: NO_QUOTE }),
        )
        .on('data', (data: Record<string, string>) => {
          const line = lines[rows.length];
          rows.push({
            line: line ? line.lineNumber : rows.length + 1,
            values: Object.values(data).map((value) => value.trim()),
          });
        })
        .on('end', () => resolve(rows))
        .on('error', (error: Error) => {
          this.logger.error(`Delimited parsing error: ${error.message}`);
          reject(
            new ReportParseError(`Delimited parsing error: ${error.message}`),
          );
        });
    });
  }

  /**
   * 첫 번째 표를 colspan/rowspan을 펼친 격자로 변환합니다
   */
  private parseHtmlTable(html: string): GridRow[] {
    const table = parse(html).querySelector('table');
    if (!table) {
      throw new ReportParseError('No table found in HTML export');
    }

    const grid: GridRow[] = [];
    const carry: (RowSpanCarry | undefined)[] = [];

    table.querySelectorAll('tr').forEach((tr, rowIndex) => {
      const values: string[] = [];
      let column = 0;

      const fillCarried = (): void => {
        let pending = carry[column];
        while (pending && pending.rows > 0) {
          values[column] = pending.value;
          pending.rows--;
          column++;
          pending = carry[column];
        }
      };

      for (const cell of this.cellsOf(tr)) {
        fillCarried();
        const text = cell.text.replace(/\s+/g, ' ').trim();
        const colspan = this.spanOf(cell, 'colspan');
        const rowspan = this.spanOf(cell, 'rowspan');

        for (let offset = 0; offset < colspan; offset++) {
          values[column + offset] = text;
          carry[column + offset] =
            rowspan > 1 ? { value: text, rows: rowspan - 1 } : undefined;
        }
        column += colspan;
      }

      carry.forEach((pending, index) => {
        if (pending && pending.rows > 0 && index >= column) {
          values[index] = pending.value;
          pending.rows--;
        }
      });

      grid.push({
        line: rowIndex + 1,
        values: Array.from(
          { length: values.length },
          (_, i) => values[i] ?? '',
        ),
      });
    });

    return grid;
  }

  private cellsOf(tr: HTMLElement): HTMLElement[] {
    return tr.childNodes.filter(
      (node): node is HTMLElement =>
        node instanceof HTMLElement &&
        (node.tagName === 'TD' || node.tagName === 'TH'),
    );
  }

  private spanOf(cell: HTMLElement, attribute: 'colspan' | 'rowspan'): number {
    const span = parseInt(cell.getAttribute(attribute) ?? '1', 10);
    return Number.isFinite(span) && span > 1 ? span : 1;
  }

  private countOccurrences(buffer: Buffer, sequence: Buffer): number {
    let count = 0;
    let index = buffer.indexOf(sequence);
    while (index !== -1) {
      count++;
      index = buffer.indexOf(sequence, index + sequence.length);
    }
    return count;
  }
}
