import { readFileSync } from 'node:fs';
import type { PriceBar } from '../types/index.js';

export interface CsvLoaderOptions {
  readonly timestampCol?: string;
  readonly openCol?: string;
  readonly highCol?: string;
  readonly lowCol?: string;
  readonly closeCol?: string;
  readonly volumeCol?: string;
}

const DEFAULTS: Required<CsvLoaderOptions> = {
  timestampCol: 'timestamp',
  openCol: 'open',
  highCol: 'high',
  lowCol: 'low',
  closeCol: 'close',
  volumeCol: 'volume',
};

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]!;
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

function parseTimestamp(value: string, lineNum: number): number {
  if (/^\d+$/.test(value)) {
    // 10자리 이하면 초 단위로 간주
    const num = Number(value);
    return value.length <= 10 ? num * 1000 : num;
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Line ${lineNum}: invalid timestamp "${value}"`);
  }
  return ms;
}

function parseNumber(value: string | undefined, name: string, lineNum: number): number {
  const num = Number(value);
  if (value === undefined || value === '' || !Number.isFinite(num)) {
    throw new Error(`Line ${lineNum}: invalid ${name} "${value ?? ''}"`);
  }
  return num;
}

function validateBar(b: PriceBar, lineNum: number): void {
  if (b.close <= 0) {
    throw new Error(`Line ${lineNum}: close must be positive`);
  }
  if (b.high !== undefined && b.low !== undefined && b.high < b.low) {
    throw new Error(`Line ${lineNum}: high (${b.high}) < low (${b.low})`);
  }
  if (b.volume !== undefined && b.volume < 0) {
    throw new Error(`Line ${lineNum}: negative volume`);
  }
}

/**
 * 헤더 있는 CSV → PriceBar[] (파일 순서 그대로)
 * close 외 컬럼은 선택 (종가 전용 CSV 지원)
 * 정렬/중복 처리는 prepareSeries 에서 (normalizeSeries 설정에 따름)
 */
export function loadCsv(
  filePath: string,
  options?: CsvLoaderOptions,
): PriceBar[] {
  const opts = { ...DEFAULTS, ...options };
  const raw = readFileSync(filePath, 'utf-8');
  const lines = raw.split(/\r?\n/).filter((l) => l.trim().length > 0);

  if (lines.length < 2) {
    throw new Error('CSV must have header + at least 1 data row');
  }

  const header = parseCsvLine(lines[0]!);
  const required = (name: string): number => {
    const idx = header.indexOf(name);
    if (idx === -1) {
      throw new Error(`Column "${name}" not found. Available: ${header.join(', ')}`);
    }
    return idx;
  };
  const optional = (name: string): number | null => {
    const idx = header.indexOf(name);
    return idx === -1 ? null : idx;
  };

  const ti = required(opts.timestampCol);
  const ci = required(opts.closeCol);
  const oi = optional(opts.openCol);
  const hi = optional(opts.highCol);
  const li = optional(opts.lowCol);
  const vi = optional(opts.volumeCol);

  const bars: PriceBar[] = [];

  for (let i = 1; i < lines.length; i++) {
    const fields = parseCsvLine(lines[i]!);
    const lineNum = i + 1;
    const col = (idx: number | null, name: string): number | undefined =>
      idx === null ? undefined : parseNumber(fields[idx], name, lineNum);

    const bar: PriceBar = {
      timestamp: parseTimestamp(fields[ti] ?? '', lineNum),
      close: parseNumber(fields[ci], 'close', lineNum),
      open: col(oi, 'open'),
      high: col(hi, 'high'),
      low: col(li, 'low'),
      volume: col(vi, 'volume'),
    };
    validateBar(bar, lineNum);
    bars.push(bar);
  }

  return bars;
}
