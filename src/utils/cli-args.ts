export interface DiscoverOptions {
  urls?: string[];
  forceBrowser?: boolean;
  maxConcurrent?: number;
  retryAttempts?: number;
  rateLimitDelaySeconds?: number;
  browserPoolSize?: number;
  proxiesFile?: string;
  output?: string;
  logLevel?: string;
  minConfidenceScore?: number;
  headed?: boolean;
  escalateOnExhaustion?: boolean;
  noSubpages?: boolean;
}

export interface ParsedArgs {
  input?: string;
  options: DiscoverOptions;
}

type NumericOption = 'maxConcurrent' | 'retryAttempts' | 'rateLimitDelaySeconds' | 'browserPoolSize' | 'minConfidenceScore';
type StringOption = 'proxiesFile' | 'output' | 'logLevel';

const NUMERIC_FLAGS: Record<string, NumericOption> = {
  '--max-concurrent': 'maxConcurrent',
  '--retry': 'retryAttempts',
  '--rate-limit': 'rateLimitDelaySeconds',
  '--browser-pool': 'browserPoolSize',
  '--min-confidence': 'minConfidenceScore'
};

const STRING_FLAGS: Record<string, StringOption> = {
  '--proxies': 'proxiesFile',
  '--output': 'output',
  '--log-level': 'logLevel'
};

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --force-browser) don't take values. The first
 * positional argument is the file of URLs to process.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { options: {} };
  const options = parsed.options;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, inlineValue] = splitFlag(arg);
    const takeValue = (): string | undefined => inlineValue ?? (i + 1 < args.length ? args[++i] : undefined);

    if (flag === '--force-browser') {
      options.forceBrowser = true;
    } else if (flag === '--headed') {
      options.headed = true;
    } else if (flag === '--escalate-on-exhaustion') {
      options.escalateOnExhaustion = true;
    } else if (flag === '--no-subpages') {
      options.noSubpages = true;
    } else if (flag === '--urls') {
      const value = takeValue();
      if (value !== undefined) {
        options.urls = value.split(',').map(s => s.trim()).filter(s => s.length > 0);
      }
    } else if (Object.hasOwn(NUMERIC_FLAGS, flag)) {
      const value = takeValue();
      if (value !== undefined) {
        options[NUMERIC_FLAGS[flag]] = parseNumber(flag, value);
      }
    } else if (Object.hasOwn(STRING_FLAGS, flag)) {
      const value = takeValue();
      if (value !== undefined) {
        options[STRING_FLAGS[flag]] = value;
      }
    } else if (!arg.startsWith('--') && parsed.input === undefined) {
      parsed.input = arg;
    }
  }

  return parsed;
}

function splitFlag(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) return [arg, undefined];
  const index = arg.indexOf('=');
  return index === -1 ? [arg, undefined] : [arg.slice(0, index), arg.slice(index + 1)];
}

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    console.error(`Error parsing ${flag}: '${value}' is not a number`);
    process.exit(1);
  }
  return parsed;
}
