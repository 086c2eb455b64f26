import * as path from 'path';
import { CLIInputParser, CLIOptions, CLIUsageError } from './CLIInputParser';
import { ConfigFactory } from '../config/ConfigFactory';
import { CompositionOverrides, CompositionRoot } from '../di/CompositionRoot';
import { UrlListLoader } from '../input/UrlListLoader';
import { LinkWriter } from '../output/LinkWriter';
import { GracefulShutdown } from '../shutdown/GracefulShutdown';
import { getGlobalLoggerConfig, getLogger, setGlobalLoggerConfig } from '../logging';
import { OUTPUT } from '../../application/config/HarvestDefaults';
import { HarvestReport } from '../../application/services/BatchHarvester';
import { AppConfig } from '../../domain/config/AppConfig';
import { ConfigurationError, errorMessage } from '../../domain/errors/AppErrors';

export interface HarvestCommandDeps {
  /** Environment used for configuration (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Collaborators replaced in tests */
  composition?: CompositionOverrides;
  /** Shutdown coordinator (default: one bound to the current process) */
  shutdown?: GracefulShutdown;
  /** Writes plain output such as the help text */
  print?: (text: string) => void;
}

// eslint-disable-next-line no-console
const defaultPrint = (text: string): void => console.log(text);

async function loadUrls(options: CLIOptions): Promise<string[] | null> {
  if (options.input) {
    return UrlListLoader.fromFile(options.input);
  }
  if (options.urls) {
    return UrlListLoader.fromList(options.urls);
  }
  return null;
}

/**
 * Runs the harvester for a command line and returns the process exit code.
 * A run that finds no links at all counts as a failure.
 */
export async function runHarvestCommand(args: string[], deps: HarvestCommandDeps = {}): Promise<number> {
  const print = deps.print ?? defaultPrint;

  let options: CLIOptions;
  try {
    options = CLIInputParser.parse(args);
  } catch (error) {
    if (error instanceof CLIUsageError) {
      print(`${error.message}\nRun with --help for usage.`);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    print(CLIInputParser.getHelpText());
    return 0;
  }

  if (options.writeConfig) {
    ConfigFactory.writeDefault(options.writeConfig);
    print(`Default configuration written to ${options.writeConfig}`);
    return 0;
  }

  let config: AppConfig;
  try {
    config = ConfigFactory.load(
      {
        configPath: options.config,
        delayBetweenRequests: options.delay,
        maxRequestsPerMinute: options.maxPerMinute,
        timeout: options.timeout,
        outputDir: options.outputDir,
        idmPath: options.idmPath,
        downloadDir: options.downloadDir,
        logLevel: options.logLevel,
        logFile: options.logFile,
      },
      deps.env
    );
  } catch (error) {
    if (error instanceof ConfigurationError) {
      getLogger('Harvester').error(error.message);
      return 1;
    }
    throw error;
  }

  setGlobalLoggerConfig({
    ...getGlobalLoggerConfig(),
    minLevel: config.logLevel,
    logFile: config.logFile,
  });
  const logger = getLogger('Harvester');
  logger.info('Starting Streaming-Page Link Harvester');

  let urls: string[] | null;
  try {
    urls = await loadUrls(options);
  } catch (error) {
    logger.error('Cannot read URL list', { error: errorMessage(error) });
    return 1;
  }
  if (urls === null) {
    logger.error('No URLs provided. Use --input or --urls');
    return 1;
  }
  if (urls.length === 0) {
    logger.error('The URL list is empty');
    return 1;
  }

  const container = CompositionRoot.initialize(config, deps.composition);
  const shutdown = deps.shutdown ?? new GracefulShutdown();
  shutdown.onShutdown(() => container.fetcher.cleanup());
  shutdown.register();

  let report: HarvestReport;
  try {
    await container.fetcher.initialize();
    report = await container.harvester.harvest(urls);
  } catch (error) {
    logger.error('Harvest aborted', { error: errorMessage(error) });
    return 1;
  } finally {
    await container.fetcher.cleanup();
    shutdown.unregister();
  }

  const linksPath = path.join(config.outputDir, OUTPUT.LINKS_FILE);
  await LinkWriter.write(report.links, linksPath);
  logger.info(`Download links written to ${linksPath}`);

  const scriptPath = await container.scriptWriter.write(config.outputDir, {
    idmPath: config.idmPath,
    downloadDir: config.downloadDir,
  });
  logger.info(`IDM script written to ${scriptPath}`);

  if (report.links.length === 0) {
    logger.error('No download links were found');
    return 1;
  }

  logger.info('Harvest completed successfully');
  return 0;
}
