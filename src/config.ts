import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ReanchorSource, SeedingMode, TriggerMode } from './types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 프로젝트 루트 .env 먼저, 이후 cwd .env 가 있으면 덮어씀
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

function envOptionalNum(key: string): number | undefined {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : undefined;
}

function envEnum<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
  const v = process.env[key]?.toUpperCase();
  if (v === undefined || v === '') return fallback;
  const match = allowed.find((a) => a === v);
  if (match === undefined) {
    throw new Error(`${key} must be one of ${allowed.join(', ')} (got "${v}")`);
  }
  return match;
}

export const TRIGGER_MODES: readonly TriggerMode[] = ['CLOSE', 'HIGH_LOW'];
export const SEEDING_MODES: readonly SeedingMode[] = ['INDEPENDENT', 'CASCADE'];
export const REANCHOR_SOURCES: readonly ReanchorSource[] = ['WATERMARK', 'BAR_CLOSE'];

export const config = {
  ladder: {
    /** 비어 있으면 레벨 할당액 합계로 시작 */
    initialCash: envOptionalNum('INITIAL_CASH'),
    triggerMode: envEnum('TRIGGER_MODE', TRIGGER_MODES, 'HIGH_LOW'),
    seeding: envEnum('SEEDING_MODE', SEEDING_MODES, 'INDEPENDENT'),
    /** 고점 갱신 기준 (0.025 = 2.5%) */
    reanchorThresholdPct: envNum('REANCHOR_THRESHOLD_PCT', 0.025),
    reanchorSource: envEnum('REANCHOR_SOURCE', REANCHOR_SOURCES, 'WATERMARK'),
    /** 레벨 정의 JSON 경로 (없으면 기본 래더) */
    levelsFile: env('LEVELS_FILE', ''),
    /** 기본 래더: 얕은 하락/소액 → 깊은 하락/고액 */
    defaultLevels: [
      { buyPct: 0.04, sellPct: 0.03, allocation: 1_000 },
      { buyPct: 0.05, sellPct: 0.035, allocation: 1_500 },
      { buyPct: 0.06, sellPct: 0.04, allocation: 2_000 },
      { buyPct: 0.08, sellPct: 0.05, allocation: 3_000 },
      { buyPct: 0.10, sellPct: 0.06, allocation: 4_000 },
    ],
  },

  metrics: {
    riskFreeRate: envNum('RISK_FREE_RATE', 0),
    /** 일봉 기준 365 */
    periodsPerYear: envNum('PERIODS_PER_YEAR', 365),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
