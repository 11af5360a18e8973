import type { CodeSource } from '../dto/report-profile.dto';

export interface CodeDetail {
  level: string;
  code: string;
  detail: string;
}

// '*' ~ '*****' 또는 '4*' 같은 축약 표기
const LEVEL_MARKER = /^(\*{1,5}|[1-9]\*)$/;

export function isLevelMarker(token: string): boolean {
  return LEVEL_MARKER.test(token);
}

/**
 * 코드 컬럼 값에서 레벨 표시, 코드, 인라인 설명을 분리합니다.
 *
 * - plain: 셀 전체가 코드
 * - trailing-token: `** Boiler retrofit NL-C-001-01` (마지막 토큰이 코드)
 * - leading-token: `** NL-C-001-01 Boiler retrofit` (레벨 다음 토큰이 코드)
 */
export function parseCodeDetail(raw: string, source: CodeSource): CodeDetail {
  const value = raw.trim();
  if (source === 'plain' || value === '') {
    return { level: '', code: value, detail: '' };
  }

  const tokens = value.split(/\s+/);
  const level = isLevelMarker(tokens[0]) ? tokens[0] : '';
  const rest = level ? tokens.slice(1) : tokens;

  if (rest.length === 0) {
    return { level, code: '', detail: '' };
  }

  if (source === 'trailing-token') {
    return {
      level,
      code: rest[rest.length - 1],
      detail: rest.slice(0, -1).join(' '),
    };
  }

  return {
    level,
    code: rest[0],
    detail: rest.slice(1).join(' '),
  };
}
