import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { config } from '../config.js';
import { LadderConfigError } from '../errors.js';
import type { LadderConfig, Level, SeedingMode } from '../types/index.js';

// ─── 스키마 ────────────────────────────────────────────────────────────────

export const levelInputSchema = z
  .object({
    index: z.number().int().nonnegative().optional(),
    buyPct: z.number().gt(0).lt(1),
    sellPct: z.number().positive().finite(),
    allocation: z.number().positive().finite(),
    nextBuyPct: z.number().gt(0).lt(1).optional(),
  })
  .strict();

export const levelsSchema = z
  .array(levelInputSchema)
  .min(1, 'ladder must have at least one level')
  .superRefine((levels, ctx) => {
    levels.forEach((level, i) => {
      if (level.index !== undefined && level.index !== i) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'index'],
          message: `expected index ${i}, got ${level.index}`,
        });
      }
    });
  });

const ladderOptionsSchema = z.object({
  initialCash: z.number().positive().finite().optional(),
  triggerMode: z.enum(['CLOSE', 'HIGH_LOW']),
  seeding: z.enum(['INDEPENDENT', 'CASCADE']),
  reanchorThresholdPct: z.number().nonnegative().finite(),
  reanchorSource: z.enum(['WATERMARK', 'BAR_CLOSE']),
  normalizeSeries: z.boolean(),
  closeOpenPositionsAtEnd: z.boolean(),
});

export type LevelInput = z.input<typeof levelInputSchema>;

export interface LadderConfigInput {
  readonly levels?: readonly LevelInput[];
  readonly initialCash?: number;
  readonly triggerMode?: string;
  readonly seeding?: string;
  readonly reanchorThresholdPct?: number;
  readonly reanchorSource?: string;
  readonly normalizeSeries?: boolean;
  readonly closeOpenPositionsAtEnd?: boolean;
}

export interface ParallelLevelLists {
  readonly buyPcts: readonly number[];
  readonly sellPcts: readonly number[];
  readonly allocations: readonly number[];
  readonly nextBuyPcts?: readonly number[];
}

function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const where = [prefix, ...issue.path.map(String)].filter((p) => p.length > 0).join('.');
    return `${where || '(root)'}: ${issue.message}`;
  });
}

// ─── 레벨 구성 ─────────────────────────────────────────────────────────────

/**
 * 임의 입력(JSON 등)에서 레벨 목록 검증 후 index 부여
 */
export function parseLevels(raw: unknown): Level[] {
  const parsed = levelsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LadderConfigError(formatIssues(parsed.error, 'levels'));
  }
  return parsed.data.map((l, index) => ({
    index,
    buyPct: l.buyPct,
    sellPct: l.sellPct,
    allocation: l.allocation,
    ...(l.nextBuyPct !== undefined ? { nextBuyPct: l.nextBuyPct } : {}),
  }));
}

export function buildLadder(inputs: readonly LevelInput[]): Level[] {
  return parseLevels(inputs);
}

/**
 * buy/sell/allocation 병렬 배열 → 레벨 레코드. 길이 불일치는 즉시 거부
 */
export function fromParallelLists(lists: ParallelLevelLists): Level[] {
  const n = lists.buyPcts.length;
  const issues: string[] = [];
  if (lists.sellPcts.length !== n) {
    issues.push(`sellPcts: expected ${n} entries, got ${lists.sellPcts.length}`);
  }
  if (lists.allocations.length !== n) {
    issues.push(`allocations: expected ${n} entries, got ${lists.allocations.length}`);
  }
  if (lists.nextBuyPcts !== undefined && lists.nextBuyPcts.length !== n) {
    issues.push(`nextBuyPcts: expected ${n} entries, got ${lists.nextBuyPcts.length}`);
  }
  if (issues.length > 0) throw new LadderConfigError(issues);

  return buildLadder(
    lists.buyPcts.map((buyPct, i) => ({
      buyPct,
      sellPct: lists.sellPcts[i] ?? Number.NaN,
      allocation: lists.allocations[i] ?? Number.NaN,
      ...(lists.nextBuyPcts !== undefined ? { nextBuyPct: lists.nextBuyPcts[i] } : {}),
    })),
  );
}

export function loadLevelsFile(filePath: string): Level[] {
  const raw = readFileSync(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LadderConfigError([`${filePath}: ${reason}`]);
  }
  return parseLevels(json);
}

function defaultLevels(): Level[] {
  if (config.ladder.levelsFile) return loadLevelsFile(config.ladder.levelsFile);
  return buildLadder(config.ladder.defaultLevels);
}

/**
 * 기본값(.env) 위에 덮어쓰기 후 전체 검증. 문제는 한 번에 모아서 던짐
 */
export function createLadderConfig(input: LadderConfigInput = {}): LadderConfig {
  const issues: string[] = [];

  let levels: Level[] = [];
  try {
    levels = input.levels !== undefined ? parseLevels(input.levels) : defaultLevels();
  } catch (err) {
    if (!(err instanceof LadderConfigError)) throw err;
    issues.push(...err.issues);
  }

  const options = ladderOptionsSchema.safeParse({
    initialCash: input.initialCash ?? config.ladder.initialCash,
    triggerMode: input.triggerMode ?? config.ladder.triggerMode,
    seeding: input.seeding ?? config.ladder.seeding,
    reanchorThresholdPct: input.reanchorThresholdPct ?? config.ladder.reanchorThresholdPct,
    reanchorSource: input.reanchorSource ?? config.ladder.reanchorSource,
    normalizeSeries: input.normalizeSeries ?? false,
    closeOpenPositionsAtEnd: input.closeOpenPositionsAtEnd ?? false,
  });
  if (!options.success) issues.push(...formatIssues(options.error, ''));

  if (issues.length > 0 || !options.success) throw new LadderConfigError(issues);

  const opts = options.data;
  return {
    levels,
    initialCash: opts.initialCash ?? levels.reduce((s, l) => s + l.allocation, 0),
    triggerMode: opts.triggerMode,
    seeding: opts.seeding,
    reanchorThresholdPct: opts.reanchorThresholdPct,
    reanchorSource: opts.reanchorSource,
    normalizeSeries: opts.normalizeSeries,
    closeOpenPositionsAtEnd: opts.closeOpenPositionsAtEnd,
  };
}

// ─── 호가 계산 ─────────────────────────────────────────────────────────────

/**
 * level 체결가 기준으로 level+1 호가를 낼 때의 하락률. 마지막 레벨이면 null
 */
export function pullbackToNext(levels: readonly Level[], level: number): number | null {
  const next = levels[level + 1];
  if (next === undefined) return null;
  return levels[level]?.nextBuyPct ?? next.buyPct;
}

/**
 * 초기 호가
 * INDEPENDENT: 각 레벨 = P0 × (1 − buyPct)
 * CASCADE:     레벨 i = 레벨 i−1 호가 × (1 − pullback)
 */
export function seedQuotes(levels: readonly Level[], p0: number, seeding: SeedingMode): number[] {
  const quotes: number[] = [];
  for (const level of levels) {
    const prev = quotes[level.index - 1];
    const pullback = pullbackToNext(levels, level.index - 1);
    if (seeding === 'CASCADE' && prev !== undefined && pullback !== null) {
      quotes.push(prev * (1 - pullback));
    } else {
      quotes.push(p0 * (1 - level.buyPct));
    }
  }
  return quotes;
}
