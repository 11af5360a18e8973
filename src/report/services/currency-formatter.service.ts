import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FormattedAmount } from '../interfaces/report-row.interface';

export type NegativeStyle = 'sign-before-symbol' | 'sign-after-symbol';

export type AmountInput = number | string | null | undefined;

type ParsedAmount =
  | { kind: 'empty' }
  | { kind: 'invalid' }
  | { kind: 'value'; value: number };

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * 정수부 문자열을 인도식으로 묶습니다. 마지막 세 자리, 이후 두 자리씩
 * 예: '12345678' -> '1,23,45,678'
 */
export function groupIndianDigits(integerPart: string): string {
  if (integerPart.length <= 3) {
    return integerPart;
  }

  const lastThree = integerPart.slice(-3);
  let rest = integerPart.slice(0, -3);
  const groups: string[] = [];

  while (rest.length > 2) {
    groups.unshift(rest.slice(-2));
    rest = rest.slice(0, -2);
  }
  if (rest.length > 0) {
    groups.unshift(rest);
  }

  return [...groups, lastThree].join(',');
}

@Injectable()
export class CurrencyFormatterService {
  private readonly symbol: string;
  private readonly negativeStyle: NegativeStyle;

  constructor(private readonly configService: ConfigService) {
    this.symbol = this.configService.get<string>('CURRENCY_SYMBOL', '₹');
    this.negativeStyle =
      this.configService.get<string>('CURRENCY_NEGATIVE_STYLE') ===
      'sign-after-symbol'
        ? 'sign-after-symbol'
        : 'sign-before-symbol';
  }

  /**
   * 금액을 `₹ 1,23,456.79` 형식으로 변환합니다. 예외를 던지지 않습니다
   */
  format(input: AmountInput): FormattedAmount {
    const parsed = this.parseAmount(input);

    switch (parsed.kind) {
      case 'empty':
        return { value: null, display: this.zeroDisplay(), fallback: false };
      case 'invalid':
        return { value: null, display: this.zeroDisplay(), fallback: true };
      case 'value':
        return this.formatValue(parsed.value);
    }
  }

  private formatValue(value: number): FormattedAmount {
    // 안전한 정수 범위를 넘으면 자릿수를 보장할 수 없음
    if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
      return { value: null, display: this.zeroDisplay(), fallback: true };
    }

    const fixed = Math.abs(value).toFixed(2);

    const [integerPart, fraction] = fixed.split('.');
    const digits = `${groupIndianDigits(integerPart)}.${fraction}`;
    const negative = value < 0 && fixed !== '0.00';

    return {
      value,
      display: negative
        ? this.negativeDisplay(digits)
        : `${this.symbol} ${digits}`,
      fallback: false,
    };
  }

  private negativeDisplay(digits: string): string {
    return this.negativeStyle === 'sign-after-symbol'
      ? `${this.symbol} -${digits}`
      : `-${this.symbol} ${digits}`;
  }

  private zeroDisplay(): string {
    return `${this.symbol} 0.00`;
  }

  private parseAmount(input: AmountInput): ParsedAmount {
    if (input === null || input === undefined) {
      return { kind: 'empty' };
    }

    if (typeof input === 'number') {
      return Number.isFinite(input)
        ? { kind: 'value', value: input }
        : { kind: 'invalid' };
    }

    let text = input.split(this.symbol).join('').replace(/[,\s]/g, '');
    if (text === '') {
      return input.trim() === '' ? { kind: 'empty' } : { kind: 'invalid' };
    }

    // SAP 내보내기의 후행 마이너스 표기: '5000.00-'
    let negative = false;
    if (text.endsWith('-')) {
      negative = true;
      text = text.slice(0, -1);
    }

    if (!NUMERIC_PATTERN.test(text) || (negative && /^[+-]/.test(text))) {
      return { kind: 'invalid' };
    }

    const value = Number(text);
    return { kind: 'value', value: negative ? -value : value };
  }
}
