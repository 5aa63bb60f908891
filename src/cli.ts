#!/usr/bin/env node
import { ZodError } from 'zod';
import { Env, loadEnv, parseCityList } from './config/env';
import { Units } from './interfaces/weather';
import { logger } from './logger';
import { HttpClient } from './modules/getWeather';
import { WeatherQueryClient } from './modules/weather';
import { UnitsSchema } from './schemas/openWeather.schema';
import { formatStatistics, formatWeatherFailure, formatWeatherRecord } from './utils/format';

export const DEFAULT_CITIES = ['London', 'Paris', 'Madrid', 'Tokyo'];

export const USAGE = [
  'Usage: weather-probe [--units=metric|imperial|standard] [--save] [city ...]',
  '',
  'Cities default to WEATHER_CITIES, then to the built-in batch.',
  'Requires OPENWEATHER_API_KEY in the environment or in .env.',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  cities: string[];
  units?: Units;
  save: boolean;
  help: boolean;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  httpClient?: HttpClient;
  now?: () => Date;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function parseUnits(value: string | undefined): Units {
  const parsed = UnitsSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Unknown unit system: ${value ?? '(missing)'}`);
  }
  return parsed.data;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { cities: [], save: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--save') {
      args.save = true;
    } else if (arg === '--units') {
      args.units = parseUnits(argv[++i]);
    } else if (arg.startsWith('--units=')) {
      args.units = parseUnits(arg.slice('--units='.length));
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (arg.trim()) {
      args.cities.push(arg.trim());
    }
  }

  return args;
}

function describeConfigError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

/**
 * Queries each city in order and prints one report per city,
 * followed by the statistics of the successful queries.
 *
 * Resolves to the process exit code: 0 when at least one city
 * succeeded, 1 when all failed, 2 on usage or configuration errors.
 */
export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;

  let args: CliArgs;
  let env: Env;

  try {
    args = parseArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return 0;
    }
    env = loadEnv(deps.env ?? process.env);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof ZodError) {
      io.stderr(`Invalid configuration: ${describeConfigError(err)}`);
      return 2;
    }
    throw err;
  }

  const configured = parseCityList(env.WEATHER_CITIES);
  const cities = args.cities.length > 0
    ? args.cities
    : configured.length > 0 ? configured : DEFAULT_CITIES;

  const client = new WeatherQueryClient({
    apiKey: env.OPENWEATHER_API_KEY,
    baseUrl: env.OPENWEATHER_BASE_URL,
    timeoutMs: env.WEATHER_TIMEOUT_MS,
    defaultUnits: args.units ?? env.WEATHER_UNITS,
    outputDir: env.WEATHER_OUTPUT_DIR,
    saveResponses: args.save || env.WEATHER_SAVE_RESPONSES,
    httpClient: deps.httpClient,
    now: deps.now,
  });

  logger.info({ cities }, 'Starting weather queries');

  let succeeded = 0;

  // One city at a time; a failure does not stop the batch
  for (const city of cities) {
    const result = await client.fetchWeather(city);

    if (result.status === 'success') {
      succeeded++;
      io.stdout(formatWeatherRecord(result.data));
    } else {
      io.stdout(formatWeatherFailure(city, result.error));
    }
  }

  const stats = client.computeStatistics();
  if (Object.keys(stats).length > 0) {
    io.stdout(formatStatistics(stats));
  }

  logger.info({ total: cities.length, succeeded }, 'Weather queries finished');

  return succeeded > 0 ? 0 : 1;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.fatal({ err }, 'Weather probe failed');
      process.exitCode = 1;
    });
}
