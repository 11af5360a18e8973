import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  CurrencyFormatterService,
  groupIndianDigits,
} from './currency-formatter.service';

describe('CurrencyFormatterService', () => {
  let service: CurrencyFormatterService;

  const createService = async (
    values: Record<string, string> = {},
  ): Promise<CurrencyFormatterService> => {
    const mockConfigService = {
      get: jest.fn(
        (key: string, defaultValue?: string) => values[key] ?? defaultValue,
      ),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CurrencyFormatterService,
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    return module.get<CurrencyFormatterService>(CurrencyFormatterService);
  };

  beforeEach(async () => {
    service = await createService();
  });

  describe('format', () => {
    it.each([
      [0, '₹ 0.00'],
      [5000, '₹ 5,000.00'],
      [150000, '₹ 1,50,000.00'],
      [12345678, '₹ 1,23,45,678.00'],
      [123456789, '₹ 12,34,56,789.00'],
      [1234567890, '₹ 1,23,45,67,890.00'],
      [123456.789, '₹ 1,23,456.79'],
      [999.5, '₹ 999.50'],
    ])('should format %p as %p', (input, expected) => {
      expect(service.format(input).display).toBe(expected);
    });

    it('should put the sign before the symbol for negative amounts', () => {
      expect(service.format(-5000)).toEqual({
        value: -5000,
        display: '-₹ 5,000.00',
        fallback: false,
      });
    });

    it('should not sign values that round to zero', () => {
      expect(service.format(-0.001).display).toBe('₹ 0.00');
    });

    it('should parse numeric strings with grouping separators', () => {
      expect(service.format('5000').display).toBe('₹ 5,000.00');
      expect(service.format('1,50,000.00').display).toBe('₹ 1,50,000.00');
      expect(service.format(' 12 345 ').display).toBe('₹ 12,345.00');
      expect(service.format('₹ 2,500.50').display).toBe('₹ 2,500.50');
    });

    it('should treat a trailing minus as a negative amount', () => {
      expect(service.format('5,000.00-')).toEqual({
        value: -5000,
        display: '-₹ 5,000.00',
        fallback: false,
      });
    });

    it('should render empty input as zero without fallback', () => {
      for (const input of [null, undefined, '', '   ']) {
        expect(service.format(input)).toEqual({
          value: null,
          display: '₹ 0.00',
          fallback: false,
        });
      }
    });

    it('should fall back to zero for non-numeric input', () => {
      for (const input of ['abc', '12a', '1.2.3', '--5', '-5-', NaN, Infinity]) {
        expect(service.format(input)).toEqual({
          value: null,
          display: '₹ 0.00',
          fallback: true,
        });
      }
    });

    it('should fall back for values too large for fixed notation', () => {
      expect(service.format(1e21).fallback).toBe(true);
    });

    it('should fall back for integers beyond the exact number range', () => {
      expect(service.format('12345678901234567890')).toEqual({
        value: null,
        display: '₹ 0.00',
        fallback: true,
      });
      expect(service.format('12345678901234567890-').fallback).toBe(true);
    });

    it('should still format the largest exact integer', () => {
      expect(service.format(Number.MAX_SAFE_INTEGER)).toEqual({
        value: Number.MAX_SAFE_INTEGER,
        display: '₹ 9,00,71,99,25,47,40,991.00',
        fallback: false,
      });
    });
  });

  describe('configuration', () => {
    it('should put the sign after the symbol when configured', async () => {
      const configured = await createService({
        CURRENCY_NEGATIVE_STYLE: 'sign-after-symbol',
      });

      expect(configured.format(-5000).display).toBe('₹ -5,000.00');
    });

    it('should use the configured symbol', async () => {
      const configured = await createService({ CURRENCY_SYMBOL: 'Rs.' });

      expect(configured.format(150000).display).toBe('Rs. 1,50,000.00');
      expect(configured.format('Rs. 1,000').display).toBe('Rs. 1,000.00');
    });
  });

  describe('groupIndianDigits', () => {
    it('should leave up to three digits ungrouped', () => {
      expect(groupIndianDigits('7')).toBe('7');
      expect(groupIndianDigits('999')).toBe('999');
    });

    it('should group the remaining digits in pairs', () => {
      expect(groupIndianDigits('1000')).toBe('1,000');
      expect(groupIndianDigits('100000')).toBe('1,00,000');
      expect(groupIndianDigits('1234567890')).toBe('1,23,45,67,890');
    });
  });
});
