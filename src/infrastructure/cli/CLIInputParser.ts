/**
 * Interface for parsed CLI options.
 */
export interface CLIOptions {
  input?: string;
  urls?: string;
  outputDir?: string;
  idmPath?: string;
  downloadDir?: string;
  delay?: number;
  maxPerMinute?: number;
  timeout?: number;
  config?: string;
  logLevel?: string;
  logFile?: string;
  writeConfig?: string;
  help?: boolean;
}

type StringOption = 'input' | 'urls' | 'outputDir' | 'idmPath' | 'downloadDir' | 'config' | 'logLevel' | 'logFile' | 'writeConfig';
type NumberOption = 'delay' | 'maxPerMinute' | 'timeout';

const STRING_FLAGS: Record<string, StringOption> = {
  '--input': 'input',
  '-i': 'input',
  '--urls': 'urls',
  '--output-dir': 'outputDir',
  '-o': 'outputDir',
  '--idm-path': 'idmPath',
  '--download-dir': 'downloadDir',
  '--config': 'config',
  '-c': 'config',
  '--log-level': 'logLevel',
  '--log-file': 'logFile',
  '--write-config': 'writeConfig',
};

const NUMBER_FLAGS: Record<string, NumberOption> = {
  '--delay': 'delay',
  '-d': 'delay',
  '--max-per-minute': 'maxPerMinute',
  '-m': 'maxPerMinute',
  '--timeout': 'timeout',
  '-t': 'timeout',
};

/**
 * Error raised for malformed command lines.
 */
export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

/**
 * Handles parsing and validation of command line arguments.
 */
export class CLIInputParser {
  /**
   * Parse command line arguments.
   * Accepts both `--flag value` and `--flag=value`.
   * @param args - Arguments array (usually process.argv.slice(2))
   * @throws CLIUsageError on unknown flags or missing values
   */
  static parse(args: string[]): CLIOptions {
    const options: CLIOptions = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--help' || arg === '-h') {
        options.help = true;
        return options;
      }

      const [flag, inlineValue] = CLIInputParser.splitInline(arg);
      const stringKey = STRING_FLAGS[flag];
      const numberKey = NUMBER_FLAGS[flag];

      if (!stringKey && !numberKey) {
        throw new CLIUsageError(`Unknown argument: ${arg}`);
      }

      let value = inlineValue;
      if (value === undefined) {
        const next = args[i + 1];
        if (next === undefined || (next.startsWith('-') && next.length > 1 && !/^-\d/.test(next))) {
          throw new CLIUsageError(`Missing value for ${flag}`);
        }
        value = next;
        i++;
      }

      if (stringKey) {
        options[stringKey] = value;
      } else if (numberKey) {
        options[numberKey] = Number(value);
      }
    }

    return options;
  }

  private static splitInline(arg: string): [string, string | undefined] {
    if (arg.startsWith('--') && arg.includes('=')) {
      const index = arg.indexOf('=');
      return [arg.slice(0, index), arg.slice(index + 1)];
    }
    return [arg, undefined];
  }

  /**
   * Generate help text for the CLI.
   */
  static getHelpText(): string {
    return `
Streaming-Page Link Harvester

Visits each page in a headless browser, extracts one download link per page
and writes links.txt plus an Internet Download Manager enqueue script.

Usage:
  link-harvester (--input <file> | --urls <list>) [options]

Input:
  --input, -i <file>         Text file with one page URL per line
  --urls <a,b,c>             Comma-separated list of page URLs

Output:
  --output-dir, -o <dir>     Directory for links.txt and the enqueue script (default: ./out)
  --idm-path <path>          Path to the IDM executable
  --download-dir <dir>       Directory where IDM should save downloads

Timing:
  --delay, -d <seconds>      Minimum delay between page loads (default: 5)
  --max-per-minute, -m <n>   Maximum page loads per minute (default: 10)
  --timeout, -t <seconds>    Page timeout and link search budget (default: 15)

Configuration:
  --config, -c <file>        YAML configuration file
  --write-config <file>      Write a configuration file with every default and exit
  --log-level <level>        DEBUG, INFO, WARNING or ERROR (default: INFO)
  --log-file <file>          Also append log lines to this file
  --help, -h                 Show this help message

Examples:
  link-harvester --input pages.txt --output-dir ./out
  link-harvester --urls https://example.com/a,https://example.com/b --delay 3
`;
  }
}
