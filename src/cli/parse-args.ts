import type { PlanTimelineInput, RenderSlideshowInput } from '@/application/slideshow/index.js';

export const USAGE = `Usage:
  reelshuffle render <inputDir> [-o animation.mp4] [timing options] [--bw] [--size 1080] [--cache-dir dir] [--no-cache]
  reelshuffle plan <inputDir> [timing options] [--json]

Timing options:
  --duration <seconds>        video duration (default 45)
  --fps <n>                   frame rate (default 24)
  --frame-duration <seconds>  display time per image (default 1)
  --freeze-prob <0..1>        chance of a freeze frame (default 0.15)
  --freeze-min <x>            minimum freeze multiplier (default 2)
  --freeze-max <x>            maximum freeze multiplier (default 5)
  --simple                    disable freeze frames
  --seed <value>              seed for a reproducible sequence`;

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand =
  | { readonly command: 'help' }
  | { readonly command: 'plan'; readonly payload: PlanTimelineInput; readonly json: boolean }
  | { readonly command: 'render'; readonly payload: RenderSlideshowInput };

interface TimingFlags {
  durationSeconds?: number;
  fps?: number;
  frameDurationSeconds?: number;
  advancedTiming?: boolean;
  freezeProbability?: number;
  freezeMultiplierMin?: number;
  freezeMultiplierMax?: number;
  seed?: string;
}

interface ParsedFlags {
  timing: TimingFlags;
  outputPath?: string;
  style?: 'color' | 'bw';
  targetSize?: number;
  cacheDir?: string;
  useCache?: boolean;
  json: boolean;
  help: boolean;
  positionals: string[];
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    return { command: 'help' };
  }

  if (command !== 'render' && command !== 'plan') {
    throw new CliUsageError(`Unknown command: ${command}`);
  }

  const flags = parseFlags(rest);
  if (flags.help) {
    return { command: 'help' };
  }

  const [inputDir, ...extra] = flags.positionals;
  if (inputDir === undefined) {
    throw new CliUsageError('Missing <inputDir>');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra[0]}`);
  }

  if (command === 'plan') {
    return { command: 'plan', payload: { inputDir, timing: flags.timing }, json: flags.json };
  }

  return {
    command: 'render',
    payload: {
      inputDir,
      timing: flags.timing,
      ...(flags.outputPath === undefined ? {} : { outputPath: flags.outputPath }),
      output: {
        ...(flags.style === undefined ? {} : { style: flags.style }),
        ...(flags.targetSize === undefined ? {} : { targetSize: flags.targetSize }),
      },
      cache: {
        ...(flags.useCache === undefined ? {} : { enabled: flags.useCache }),
        ...(flags.cacheDir === undefined ? {} : { directory: flags.cacheDir }),
      },
    },
  };
}

function parseFlags(argv: readonly string[]): ParsedFlags {
  const flags: ParsedFlags = { timing: {}, json: false, help: false, positionals: [] };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('-')) {
      flags.positionals.push(arg);
      continue;
    }

    const next = (): string => {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new CliUsageError(`Missing value for ${arg}`);
      }
      i += 1;
      return value;
    };

    switch (arg) {
      case '-o':
      case '--output':
        flags.outputPath = next();
        break;
      case '--duration':
        flags.timing.durationSeconds = parseNumber(arg, next());
        break;
      case '--fps':
        flags.timing.fps = parseInteger(arg, next());
        break;
      case '--frame-duration':
        flags.timing.frameDurationSeconds = parseNumber(arg, next());
        break;
      case '--freeze-prob':
        flags.timing.freezeProbability = parseNumber(arg, next());
        break;
      case '--freeze-min':
        flags.timing.freezeMultiplierMin = parseNumber(arg, next());
        break;
      case '--freeze-max':
        flags.timing.freezeMultiplierMax = parseNumber(arg, next());
        break;
      case '--simple':
        flags.timing.advancedTiming = false;
        break;
      case '--seed':
        flags.timing.seed = next();
        break;
      case '--bw':
      case '--black-white':
        flags.style = 'bw';
        break;
      case '--size':
        flags.targetSize = parseInteger(arg, next());
        break;
      case '--cache-dir':
        flags.cacheDir = next();
        break;
      case '--no-cache':
        flags.useCache = false;
        break;
      case '--json':
        flags.json = true;
        break;
      case '-h':
      case '--help':
        flags.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return flags;
}

function parseNumber(flag: string, raw: string): number {
  const value = raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function parseInteger(flag: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || `${value}` !== raw.trim()) {
    throw new CliUsageError(`${flag} expects an integer, got "${raw}"`);
  }
  return value;
}
