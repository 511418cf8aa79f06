#!/usr/bin/env node
import { loadCsv } from './data/csv-loader.js';
import { BacktestEngine, type BacktestConfig } from './engine/backtest-engine.js';
import { loadLevelsFile } from './strategy/ladder.js';
import { formatReport, formatTrades } from './report/formatter.js';
import { paramSweep, formatSweepResults, type ParamRange } from './optimization/param-sweep.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('cli');

function printUsage(): void {
  console.log(`
Usage:
  tsx src/index.ts backtest <csv-file> [options]
  tsx src/index.ts sweep <csv-file> [options]

Commands:
  backtest      Run the ladder over the price series and print the report
  sweep         Grid search over re-anchor threshold and buy/sell scale

Options:
  --capital <number>        Starting cash (default: sum of level allocations)
  --levels <file>           Level definitions JSON (see config/ladder.json)
  --mode <close|hl>         Trigger on close only, or on bar high/low (default: hl)
  --seeding <mode>          independent | cascade (default: independent)
  --threshold <number>      Watermark re-anchor threshold, fraction (default: 0.025)
  --reanchor <source>       watermark | close (default: watermark)
  --rf <number>             Annual risk-free rate for Sharpe (default: 0)
  --periods <number>        Bars per year for Sharpe (default: 365)
  --normalize               Sort and de-duplicate the series instead of rejecting it
  --liquidate               Close open positions at the last close
  --trades                  Show individual fills

Settings can also come from .env (see .env.example).
`);
}

function parseArgs(args: string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_command')) {
      map.set('_command', arg);
    } else if (!map.has('_file')) {
      map.set('_file', arg);
    }
  }
  return map;
}

function getNum(args: Map<string, string>, key: string): number | undefined {
  const v = args.get(key);
  return v ? Number(v) : undefined;
}

const MODE_ALIASES: Record<string, string> = { close: 'CLOSE', hl: 'HIGH_LOW', high_low: 'HIGH_LOW' };
const REANCHOR_ALIASES: Record<string, string> = { watermark: 'WATERMARK', close: 'BAR_CLOSE', bar_close: 'BAR_CLOSE' };

function buildConfig(args: Map<string, string>): BacktestConfig {
  const mode = args.get('--mode');
  const seeding = args.get('--seeding');
  const reanchor = args.get('--reanchor');
  const levelsFile = args.get('--levels');

  return {
    ...(levelsFile ? { levels: loadLevelsFile(levelsFile) } : {}),
    initialCash: getNum(args, '--capital'),
    triggerMode: mode ? MODE_ALIASES[mode.toLowerCase()] ?? mode : undefined,
    seeding: seeding?.toUpperCase(),
    reanchorThresholdPct: getNum(args, '--threshold'),
    reanchorSource: reanchor ? REANCHOR_ALIASES[reanchor.toLowerCase()] ?? reanchor : undefined,
    riskFreeRate: getNum(args, '--rf'),
    periodsPerYear: getNum(args, '--periods'),
    normalizeSeries: args.has('--normalize'),
    closeOpenPositionsAtEnd: args.has('--liquidate'),
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.get('_command');
  const file = args.get('_file');

  if (!command || !file) {
    printUsage();
    process.exit(1);
  }

  const bars = loadCsv(file);
  log.info({ bars: bars.length, file }, 'Price series loaded');

  const engineConfig = buildConfig(args);

  switch (command) {
    case 'backtest': {
      const engine = new BacktestEngine(engineConfig);
      const report = engine.run(bars);
      console.log(formatReport(report));
      if (args.has('--trades')) {
        console.log(formatTrades(report));
      }
      break;
    }

    case 'sweep': {
      const ranges: ParamRange[] = [
        { name: 'reanchorThresholdPct', min: 0.015, max: 0.035, step: 0.005 },
        { name: 'buyPctScale', min: 0.75, max: 1.25, step: 0.25 },
        { name: 'sellPctScale', min: 0.75, max: 1.25, step: 0.25 },
      ];
      const results = paramSweep(bars, ranges, engineConfig);
      console.log(formatSweepResults(results, 15));
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
