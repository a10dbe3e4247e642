import {
  PlanTimelineCommand,
  PlanTimelineHandler,
  RenderSlideshowCommand,
  RenderSlideshowHandler,
  type RenderProgress,
  type RenderSlideshowDependencies,
} from '@/application/slideshow/index.js';
import {
  DirectoryImagePool,
  FfmpegVideoEncoder,
  SlideshowMaterializerFactory,
} from '@/infrastructure/slideshow/index.js';
import { ReelError } from '@/shared/errors/base.error.js';

import { formatPlanJson, formatPlanReport, formatProgressBar, formatRenderSummary } from './format-report.js';
import { CliUsageError, parseCliArgs, USAGE } from './parse-args.js';

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface CliOptions {
  readonly io?: CliIo;
  readonly dependencies?: RenderSlideshowDependencies;
  readonly signal?: AbortSignal;
}

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

export function createDefaultDependencies(): RenderSlideshowDependencies {
  return {
    scanner: new DirectoryImagePool(),
    materializers: new SlideshowMaterializerFactory(),
    encoder: new FfmpegVideoEncoder(),
  };
}

export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;

  try {
    const parsed = parseCliArgs(argv);
    const dependencies = options.dependencies ?? createDefaultDependencies();

    switch (parsed.command) {
      case 'help': {
        io.stdout(USAGE);
        return 0;
      }
      case 'plan': {
        const handler = new PlanTimelineHandler(dependencies.scanner);
        const plan = await handler.execute(new PlanTimelineCommand(parsed.payload));
        io.stdout(parsed.json ? formatPlanJson(plan) : formatPlanReport(plan));
        return 0;
      }
      case 'render': {
        const handler = new RenderSlideshowHandler(dependencies);
        let lastPercent = -1;
        const onProgress = (progress: RenderProgress): void => {
          const percent = Math.floor(progress.percent);
          if (percent !== lastPercent) {
            lastPercent = percent;
            io.stderr(`${progress.phase.padEnd(13)} ${formatProgressBar(progress.percent)}`);
          }
        };
        const outcome = await handler.execute(new RenderSlideshowCommand(parsed.payload), {
          signal: options.signal,
          onProgress,
        });
        io.stdout(formatRenderSummary(outcome));
        return 0;
      }
      default: {
        const exhaustive: never = parsed;
        throw new CliUsageError(`Unsupported command ${JSON.stringify(exhaustive)}`);
      }
    }
  } catch (error) {
    io.stderr(describeError(error));
    return 1;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof CliUsageError) {
    return `${error.message}\n\n${USAGE}`;
  }

  if (error instanceof ReelError) {
    const details = error.code === 'slideshow.encoder-failed' && typeof error.metadata?.stderr === 'string'
      ? `\n${error.metadata.stderr}`
      : '';
    return `Error [${error.code}]: ${error.message}${details}`;
  }

  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}
