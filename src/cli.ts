import { Command, InvalidArgumentError } from 'commander';
import { createSpinner } from 'nanospinner';
import pc from 'picocolors';
import { requireApiKey, resolveConfig, toCoordinatorConfig } from './config.js';
import { ConfigError, ValidationError, errorMessage } from './errors.js';
import { prepareReviewRequest, resolveProjectRoot } from './input/index.js';
import { ModelCapabilityCache } from './models/capabilityCache.js';
import type { ModelApi } from './models/modelApi.js';
import { OpenRouterClient } from './models/openRouterClient.js';
import { INDEX_DIR_NAME, LocalProjectIndex } from './project/localProjectIndex.js';
import { DualReviewCoordinator } from './review/coordinator.js';
import { AdmissionGate } from './shared/admissionGate.js';
import { createLogger } from './shared/logger.js';
import { printAggregatedReport } from './output/terminal.js';
import { printJsonReport } from './output/json.js';
import type { AggregateResult, CliConfig, ReviewKind, ReviewRequest, ReviewerRole } from './types.js';

/** Exit codes */
export const EXIT_OK = 0;
export const EXIT_REVIEW_FAILED = 1;
export const EXIT_USAGE = 2;

interface CommonOptions {
  readonly paths?: string[];
  readonly context?: string;
  readonly root?: string;
  readonly primaryModel?: string;
  readonly secondaryModel?: string;
  readonly synthesisModel?: string;
  readonly timeout?: number;
  readonly concurrency?: number;
  /** false with --no-index */
  readonly index: boolean;
  readonly json?: boolean;
  readonly verbose?: boolean;
}

interface DesignOptions extends CommonOptions {
  readonly constraints?: string;
}

/** Overrides for tests and embedding */
export interface RunOverrides {
  /** Build the model API instead of the OpenRouter client */
  readonly createApi?: (config: CliConfig, apiKey: string) => ModelApi;
}

function parsePositiveInt(value: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return num;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('--paths <paths...>', 'Files or directories (under the project root) to embed')
    .option('--context <text>', 'Additional context for the reviewers')
    .option('--root <dir>', 'Project root (default: inferred from absolute --paths, else current directory)')
    .option('--primary-model <model>', 'Primary reviewer model')
    .option('--secondary-model <model>', "Secondary reviewer model ('0' or 'disabled' to turn off)")
    .option('--synthesis-model <model>', 'Model that merges both reviews (default: primary model)')
    .option('--timeout <seconds>', 'Per-reviewer timeout in seconds (default: 300)', parsePositiveInt)
    .option('--concurrency <n>', 'Max in-flight model requests (default: 4)', parsePositiveInt)
    .option('--no-index', 'Do not offer project tools to the reviewers')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging and tool call details');
}

/**
 * Run the twin-review CLI and resolve with the process exit code.
 *
 * Pipeline: input → validate & embed → Primary ∥ Secondary review → synthesis → output
 */
export async function run(argv: string[], overrides: RunOverrides = {}): Promise<number> {
  let exitCode = EXIT_OK;

  const program = new Command()
    .name('twin-review')
    .description('Parallel dual-model design and code review over OpenRouter')
    .version('0.1.0');

  withCommonOptions(
    program
      .command('design')
      .description('Review a system design proposal')
      .argument('[proposal]', 'Proposal text')
      .option('--constraints <text>', 'Constraints the design must respect'),
  ).action(async (proposal: string | undefined, opts: DesignOptions) => {
    exitCode = await execute('design', proposal, opts, overrides);
  });

  withCommonOptions(
    program
      .command('code')
      .description('Review code')
      .argument('[code]', 'Code to review (or use --paths)'),
  ).action(async (code: string | undefined, opts: CommonOptions) => {
    exitCode = await execute('code', code, opts, overrides);
  });

  await program.parseAsync(argv);
  return exitCode;
}

/** 0 when at least one reviewer succeeded */
export function exitCodeFor(result: AggregateResult): number {
  const succeeded =
    result.primary.status === 'succeeded' || result.secondary?.status === 'succeeded';
  return succeeded ? EXIT_OK : EXIT_REVIEW_FAILED;
}

async function execute(
  kind: ReviewKind,
  text: string | undefined,
  opts: DesignOptions,
  overrides: RunOverrides,
): Promise<number> {
  // ─── Stage 1: Config & Input ──────────────────────────────

  let config: CliConfig;
  let apiKey: string;
  let root: string;
  let request: ReviewRequest;
  try {
    config = resolveConfig({
      primaryModel: opts.primaryModel,
      secondaryModel: opts.secondaryModel,
      synthesisModel: opts.synthesisModel,
      timeout: opts.timeout,
      concurrency: opts.concurrency,
      index: opts.index,
      json: opts.json,
      verbose: opts.verbose,
    });
    apiKey = requireApiKey(config);
    root = resolveProjectRoot(opts.root, process.cwd(), opts.paths);
    request = await prepareReviewRequest(
      { kind, text, paths: opts.paths, constraints: opts.constraints, context: opts.context },
      root,
      config.maxInputChars,
    );
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ValidationError) {
      console.error(pc.red(`Error: ${err.message}`));
      return EXIT_USAGE;
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel });
  if (request.embeddedFiles.length > 0 || request.skippedFiles.length > 0) {
    logger.info(
      `embedded ${request.embeddedFiles.length} file(s), skipped ${request.skippedFiles.length}`,
    );
  }

  // ─── Stage 2: Engine ──────────────────────────────────────

  const api =
    overrides.createApi?.(config, apiKey) ??
    new OpenRouterClient({
      apiKey,
      baseUrl: config.baseUrl,
      httpReferer: config.httpReferer,
      appTitle: config.appTitle,
    });
  const cache = new ModelCapabilityCache(api, { ttlSeconds: config.metadataTtlSeconds, logger });
  const gate = new AdmissionGate(config.maxConcurrentRequests);

  let index: LocalProjectIndex | undefined;
  if (config.useIndex) {
    index =
      LocalProjectIndex.detect(root, {
        maxDirEntries: config.maxDirEntries,
        maxSearchResults: config.maxSearchResults,
      }) ?? undefined;
    if (!index) logger.info(`no ${INDEX_DIR_NAME}/ directory under ${root}; reviewing without tools`);
  }

  const coordinator = new DualReviewCoordinator(
    { api, cache, gate, index, logger },
    toCoordinatorConfig(config),
  );

  // ─── Stage 3: Review ──────────────────────────────────────

  const active = new Set<string>();
  const label = (role: ReviewerRole, model: string) => `${role}:${model}`;
  const reviewStart = Date.now();
  const formatElapsed = () => {
    const sec = Math.floor((Date.now() - reviewStart) / 1000);
    return sec < 60 ? `${sec}s` : `${Math.floor(sec / 60)}m${sec % 60}s`;
  };
  const formatProgress = () => `Reviewing [${formatElapsed()}] ${[...active].join(', ')}`;

  const spinner = createSpinner(`Starting ${kind} review...`, { stream: process.stderr }).start();
  const progressTimer = setInterval(() => {
    spinner.update({ text: formatProgress() });
  }, 1000);

  let result: AggregateResult;
  try {
    result = await coordinator.review(request, {
      onReviewerStart: (role, model) => {
        active.add(label(role, model));
        spinner.update({ text: formatProgress() });
      },
      onReviewerComplete: (outcome) => {
        active.delete(label(outcome.role, outcome.modelId));
        spinner.update({ text: formatProgress() });
      },
      onSynthesisStart: (model) => {
        spinner.update({ text: `Synthesizing with ${model} [${formatElapsed()}]` });
      },
    });
  } catch (err) {
    spinner.error({ text: errorMessage(err) });
    throw err;
  } finally {
    clearInterval(progressTimer);
  }

  const code = exitCodeFor(result);
  if (code === EXIT_OK) {
    spinner.success({ text: `Review complete in ${formatElapsed()}` });
  } else {
    spinner.error({ text: `No reviewer succeeded (${formatElapsed()})` });
  }

  // ─── Output ───────────────────────────────────────────────

  if (config.jsonOutput) {
    printJsonReport(result);
  } else {
    printAggregatedReport(result, config.verbose);
  }
  return code;
}
