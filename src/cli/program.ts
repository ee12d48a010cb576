/**
 * cloudsweep command-line program
 *
 * List AWS resources on one account across regions and services, save the
 * result as a listing file, and read saved listings back.
 */

import { Command, type OutputConfiguration } from 'commander';
import chalk from 'chalk';

import { recreateCaches } from '../catalog/caches';
import { loadMetadata, type MetadataSource } from '../catalog/metadata';
import { OperationCatalog } from '../catalog/operations';
import { introspectRegions, RegionResolver, type HostProbe } from '../catalog/regions';
import { ClientCache } from '../providers/aws/client';
import { AwsOperationExecutor } from '../providers/aws/executor';
import { formatErrorMessage } from '../providers/aws/errors';
import type { RetryInfo } from '../providers/aws/retry';
import { Dispatcher, type DispatchEvent, type DispatchResult, type RunExecutor } from '../query/dispatcher';
import {
  countRecords,
  formatListingDetail,
  formatSummaryLines,
  loadListingFiles,
  RESULT_MARKERS,
  writeResultGroup,
  type ResultCounts,
} from '../query/listing';
import { RESULT_CLASSES, type OperationCall, type ResultClass } from '../query/types';
import { getCacheDirectory, loadConfig, validateConfig, type Config } from '../utils/config';

export const VERSION = '0.1.0';

export interface Runtime {
  config: Config;
  metadata: MetadataSource;
  catalog: OperationCatalog;
  regions: RegionResolver;
}

export interface ExecutorHooks {
  onRetry: (call: OperationCall, info: RetryInfo) => void;
}

export interface ProgramOptions {
  loadRuntime?: (configPath?: string) => Promise<Runtime>;
  createExecutor?: (runtime: Runtime, hooks: ExecutorHooks) => RunExecutor;
  /** Endpoint check used by `introspect list-service-regions` and `recreate-caches` */
  probe?: HostProbe;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  /** Throw a CommanderError instead of exiting the process */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

export function buildRuntime(config: Config, metadata: MetadataSource): Runtime {
  return {
    config,
    metadata,
    catalog: new OperationCatalog(metadata.models, metadata.rules),
    regions: new RegionResolver(metadata.regions, metadata.models),
  };
}

/**
 * Load config and metadata for one command
 */
export async function loadRuntime(configPath?: string): Promise<Runtime> {
  const config = await loadConfig(configPath);
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    throw new Error(['Configuration errors:', ...configErrors.map((e) => `  - ${e}`)].join('\n'));
  }

  const metadata = await loadMetadata({ cacheDirectory: getCacheDirectory(config) });
  return buildRuntime(config, metadata);
}

function createAwsExecutor(runtime: Runtime, hooks: ExecutorHooks): RunExecutor {
  const { models } = runtime.metadata;
  return new AwsOperationExecutor(models, new ClientCache(models), {
    maxPages: runtime.config.query.maxPages,
    retry: runtime.config.query.retry,
    onRetry: hooks.onRetry,
  });
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

const CLASS_COLORS: Record<ResultClass, (text: string) => string> = {
  NOTHING: chalk.gray,
  SOMETHING: chalk.green,
  NO_ACCESS: chalk.yellow,
  ERROR: chalk.red,
};

function formatCounts(counts: ResultCounts): string {
  return RESULT_CLASSES.map((resultClass) => CLASS_COLORS[resultClass](`${resultClass}: ${counts[resultClass]}`)).join(
    '  '
  );
}

function colorLine(line: string): string {
  const resultClass = RESULT_CLASSES.find((c) => line.startsWith(RESULT_MARKERS[c]));
  return resultClass ? CLASS_COLORS[resultClass](line) : line;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const {
    loadRuntime: load = loadRuntime,
    createExecutor = createAwsExecutor,
    probe,
    print = (line: string) => console.log(line),
    printError = (line: string) => console.error(line),
  } = options;

  const program = new Command();
  // Inherited by every subcommand added below
  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.output) {
    program.configureOutput(options.output);
  }

  function fail(message: string): never {
    return program.error(chalk.red(`Error: ${message}`));
  }

  async function runtime(): Promise<Runtime> {
    const { config: configPath } = program.opts<{ config?: string }>();
    try {
      return await load(configPath);
    } catch (error) {
      return fail(formatErrorMessage(error));
    }
  }

  function reportJobEvent(event: DispatchEvent, verbose: number): void {
    const { job } = event;
    if (event.type === 'job_start') {
      if (verbose >= 2) {
        print(chalk.blue(`→ ${job.toString()}`));
      }
      return;
    }
    if (verbose >= 1 && job.resultClass) {
      print(CLASS_COLORS[job.resultClass](`✓ ${job.toString()} ${job.resultClass} (${job.elapsedMs ?? 0}ms)`));
    }
  }

  program
    .name('cloudsweep')
    .version(VERSION)
    .description(
      'List AWS resources on one account across regions and services. ' +
        'Saves the result into a JSON listing, which can be passed to `show` to list its contents.'
    )
    .option('--config <path>', 'Path to a config file (default: .cloudsweep/config.yaml)');

  // Query is the main subcommand, so it comes first
  program
    .command('query')
    .description('Query AWS for resources')
    .option('-s, --service <service>', 'Restrict querying to the given service (repeatable)', collect, [])
    .option('-r, --region <region>', 'Restrict querying to the given region (repeatable)', collect, [])
    .option('-o, --operation <operation>', 'Restrict querying to the given operation (repeatable)', collect, [])
    .option('-p, --parallel <count>', 'Number of requests to run in parallel')
    .option('-d, --directory <dir>', 'Directory to save the listing to')
    .option('-c, --profile <profile>', 'Use a specific .aws/credentials profile')
    .option('-v, --verbose', 'Print detailed info during run (repeat for more)', increaseVerbosity, 0)
    .action(
      async (opts: {
        service: string[];
        region: string[];
        operation: string[];
        parallel?: string;
        directory?: string;
        profile?: string;
        verbose: number;
      }) => {
        const current = await runtime();
        const { catalog } = current;
        const query = current.config.query;

        const parallel = opts.parallel === undefined ? query.parallel : parseInt(opts.parallel, 10);
        if (!Number.isInteger(parallel) || parallel < 1) {
          fail(`Invalid parallel count: ${opts.parallel}`);
        }

        const services = opts.service.length > 0 ? opts.service : query.services;
        const directory = opts.directory ?? query.directory;

        const dispatcher = new Dispatcher({
          catalog,
          regions: current.regions,
          filters: current.metadata.filters,
          createExecutor: () =>
            createExecutor(current, {
              onRetry: (call, info) => {
                if (opts.verbose >= 2) {
                  print(
                    chalk.yellow(
                      `  ${call.region} ${call.service} ${call.operation} throttled, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`
                    )
                  );
                }
              },
            }),
          onEvent: (event) => reportJobEvent(event, opts.verbose),
        });

        const controller = new AbortController();
        const onInterrupt = () => {
          if (controller.signal.aborted) {
            process.exit(130);
          }
          printError(chalk.yellow('Interrupted: letting running requests finish (Ctrl+C again to quit)'));
          controller.abort();
        };
        process.on('SIGINT', onInterrupt);

        let result: DispatchResult;
        let path: string;
        try {
          result = await dispatcher.run({
            services: services.length > 0 ? services : catalog.getServices(),
            regions: opts.region.length > 0 ? opts.region : query.regions,
            operations: opts.operation.length > 0 ? opts.operation : query.operations,
            parallelism: parallel,
            profile: opts.profile ?? query.profile,
            signal: controller.signal,
          });
          path = await writeResultGroup(result.group, directory);
        } catch (error) {
          return fail(formatErrorMessage(error));
        } finally {
          process.off('SIGINT', onInterrupt);
        }

        // ERROR records are part of the listing, not a failed run
        print(chalk.cyan(`Wrote results to ${path}`));
        for (const line of formatSummaryLines(result.group)) {
          print(colorLine(line));
        }
        print(chalk.gray('─'.repeat(40)));
        print(formatCounts(countRecords(result.records)));
        if (result.pending.length > 0) {
          print(chalk.yellow(`${result.pending.length} of ${result.jobs.length} jobs were not run`));
        }
      }
    );

  // Once you have queried, show is the next most important command
  program
    .command('show')
    .description('Show a summary or details of saved listings')
    .argument('[files...]', 'listing file(s) to load and print')
    .option('-v, --verbose', 'print given listing files with detailed info', increaseVerbosity, 0)
    .action(async (files: string[], opts: { verbose: number }, command: Command) => {
      if (files.length === 0) {
        command.help({ error: true });
      }

      for (const summary of await loadListingFiles(files)) {
        if (!summary.ok) {
          printError(chalk.red(`${summary.path}: ${summary.error}`));
          continue;
        }
        print(chalk.cyan(summary.path));
        print(`  ${formatCounts(summary.counts)}`);
        if (opts.verbose > 0) {
          for (const line of formatListingDetail(summary.group)) {
            print(line.startsWith('  ') ? `  ${colorLine(line.trimStart())}` : chalk.bold(line));
          }
        }
      }
    });

  // Introspection debugging is not the main function, so it lives in a subcommand
  const introspect = program.command('introspect').description('Print introspection debugging information');

  introspect
    .command('list-services')
    .description('List short names of the AWS services that can be queried')
    .action(async () => {
      const { catalog } = await runtime();
      catalog.getServices().forEach((service) => print(service));
    });

  introspect
    .command('list-service-regions')
    .description('Compare the regions services are said to be available in with live endpoints')
    .action(async () => {
      const { catalog, regions, metadata } = await runtime();
      print(chalk.gray(`Region data: ${metadata.regionsPath}`));

      const diagnostics = await introspectRegions(regions, metadata.models, catalog.getServices(), { probe }).catch(
        (error: unknown) => fail(formatErrorMessage(error))
      );
      for (const row of diagnostics) {
        print(chalk.cyan(`${row.service}: ${row.believed.length} believed, ${row.reachable.length} reachable`));
        print(chalk.gray(`  believed: ${row.believed.join(' ')}`));
        print(chalk.gray(`  reachable: ${row.reachable.join(' ')}`));
        if (row.missing.length > 0) {
          print(chalk.yellow(`  missing: ${row.missing.join(' ')}`));
        }
        if (row.extra.length > 0) {
          print(chalk.yellow(`  extra: ${row.extra.join(' ')}`));
        }
      }
    });

  introspect
    .command('list-operations')
    .description('List all discovered listing operations on all (or specified) services')
    .option('-s, --service <service>', 'Only list operations of the given service (repeatable)', collect, [])
    .action(async (opts: { service: string[] }) => {
      const { catalog } = await runtime();
      const services = opts.service.length > 0 ? opts.service : catalog.getServices();
      for (const service of services) {
        if (!catalog.hasService(service)) {
          fail(`Unknown service: ${service}`);
        }
        for (const operation of catalog.listingOperations(service)) {
          print(`${service} ${operation}`);
        }
      }
    });

  introspect
    .command('debug')
    .description('List every operation of every service with its verb')
    .action(async () => {
      const { catalog } = await runtime();
      for (const service of catalog.getServices()) {
        for (const { operation, verb } of catalog.allVerbs(service)) {
          print(`${service} ${verb} ${operation}`);
        }
      }
    });

  // Refreshing the region cache comes last
  program
    .command('recreate-caches')
    .description(
      'The list of AWS regions per service changes over time. This (re-)creates the cached ' +
        'region data by checking which endpoints exist. The cache lives in your OS-dependent ' +
        'cache directory, e.g. ~/.cache/cloudsweep/'
    )
    .option('--update-packaged-values', 'Update the data files shipped with cloudsweep instead of the cache')
    .action(async (opts: { updatePackagedValues?: boolean }) => {
      const { config, metadata } = await runtime();
      print(chalk.cyan('Probing service endpoints...'));

      const { path, data } = await recreateCaches(metadata.models, metadata.regions, {
        cacheDirectory: getCacheDirectory(config),
        updatePackagedValues: opts.updatePackagedValues,
        probe,
      }).catch((error: unknown) => fail(formatErrorMessage(error)));
      const regional = Object.keys(data.services).length;
      print(chalk.green(`Wrote region data for ${regional} regional services to ${path}`));
    });

  return program;
}
