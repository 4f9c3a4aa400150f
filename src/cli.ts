import { readFileSync } from 'fs';
import { join } from 'path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { resolveToolchain } from '@/config/toolchain';
import type { ToolchainConfig } from '@/config/toolchain';
import { FrameCleanupService } from '@/modules/frame-cleanup';
import { FrameExtractionService } from '@/modules/frame-extraction';
import type { SamplingMode } from '@/modules/frame-extraction';
import { JobsService } from '@/modules/jobs';
import { MetadataService } from '@/modules/metadata';
import { AppError, getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

interface ExtractCliOptions {
  path: string;
  output_dir?: string;
  num_frames?: number;
  interval_sec?: number;
}

interface DeleteCliOptions {
  target_path: string;
}

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(join(__dirname, '..', 'package.json'), 'utf-8');
  return packageSchema.parse(JSON.parse(raw)).version;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value.trim());
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function createJobsService(config: ToolchainConfig): JobsService {
  return new JobsService({
    getExtractor: () => {
      const toolchain = resolveToolchain(config);
      logger.info(toolchain, 'FFmpeg toolchain resolved');
      return new FrameExtractionService(toolchain, new MetadataService(toolchain));
    },
    cleaner: new FrameCleanupService(),
  });
}

export function buildCli(jobs: JobsService): Command {
  const program = new Command()
    .name('frame-dump')
    .description('Extract frames from video files, singly or in batches.')
    .version(readVersion(), '-v, --version', 'Show version')
    .exitOverride();

  program
    .command('extract')
    .description('Extract frames from video(s).')
    .requiredOption('--path <path>', 'Path to a single video or a batch .json file')
    .option('--output_dir <dir>', 'Custom output directory, ignored for batch processing')
    .addOption(
      new Option('--num_frames <count>', 'Total number of frames to extract per video')
        .argParser(parseInteger)
        .conflicts('interval_sec'),
    )
    .addOption(
      new Option('--interval_sec <seconds>', 'Interval in seconds between frames')
        .argParser(parseDecimal)
        .conflicts('num_frames'),
    )
    .action(async (options: ExtractCliOptions, command: Command) => {
      let mode: SamplingMode;
      if (options.num_frames !== undefined) {
        mode = { kind: 'frame-count', frameCount: options.num_frames };
      } else if (options.interval_sec !== undefined) {
        mode = { kind: 'interval', intervalSeconds: options.interval_sec };
      } else {
        command.error("error: one of the options '--num_frames <count>' or '--interval_sec <seconds>' is required");
      }

      await jobs.runExtract({ path: options.path, outputDir: options.output_dir, mode });
    });

  program
    .command('delete')
    .description('Delete extracted .png frames from a directory.')
    .requiredOption('--target_path <path>', "Path to the video's parent directory or the frames directory itself")
    .action(async (options: DeleteCliOptions) => {
      await jobs.runDelete(options.target_path);
    });

  return program;
}

/**
 * Parses and runs one invocation. Resolves to the process exit code.
 */
export async function runCli(argv: string[], jobs: JobsService): Promise<number> {
  const program = buildCli(jobs);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const code = error instanceof AppError ? error.code : 'unexpected';
    logger.error({ code }, `Operation failed: ${getErrorMessage(error)}`);
    return 1;
  }
}
