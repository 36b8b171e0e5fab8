import { readFileSync } from 'fs';
import dotenv from 'dotenv';
import { DEFAULT_CURRENCY } from '../../data/amount/amount';
import { BUDGET_MATCHER_DEFAULTS } from '../../data/operation/budget';
import { ConfigError } from '../errors/errors';
import { LogLevel, parseLogLevel, setLogLevel } from '../log/logger';
import {
  AmountTolerance,
  DEFAULT_MATCHER_PARAMS,
  MatcherParams,
  UNBOUNDED_TOLERANCE,
  ratioTolerance,
} from '../matching/operationMatcher';

export type ForecasterConfig = {
  defaultCurrency: string;
  plannedOperationMatcher: MatcherParams;
  budgetMatcher: MatcherParams;
  logLevel: LogLevel;
};

/**
 * Matcher defaults as written in the JSON file. A null ratio means unbounded.
 */
type MatcherFileSection = {
  approxBefore?: number;
  approxAfter?: number;
  amountRatio?: number | null;
};

type ConfigFile = {
  defaultCurrency?: string;
  logLevel?: string;
  plannedOperation?: MatcherFileSection;
  budget?: MatcherFileSection;
};

type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDays(value: unknown, key: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative whole number of days`, key);
  }
  return value;
}

function readRatio(value: unknown, key: string): number | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative number or null`, key);
  }
  return value;
}

function readMatcherSection(value: unknown, key: string): MatcherFileSection {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be an object`, key);
  }
  return {
    approxBefore: readDays(value.approxBefore, `${key}.approxBefore`),
    approxAfter: readDays(value.approxAfter, `${key}.approxAfter`),
    amountRatio: readRatio(value.amountRatio, `${key}.amountRatio`),
  };
}

function readConfigFile(filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${reason}`, 'FORECASTER_CONFIG');
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file ${filePath} must hold an object`, 'FORECASTER_CONFIG');
  }
  if (parsed.defaultCurrency !== undefined && typeof parsed.defaultCurrency !== 'string') {
    throw new ConfigError('defaultCurrency must be a string', 'defaultCurrency');
  }
  if (parsed.logLevel !== undefined && typeof parsed.logLevel !== 'string') {
    throw new ConfigError('logLevel must be a string', 'logLevel');
  }
  return {
    defaultCurrency: parsed.defaultCurrency,
    logLevel: parsed.logLevel,
    plannedOperation: readMatcherSection(parsed.plannedOperation, 'plannedOperation'),
    budget: readMatcherSection(parsed.budget, 'budget'),
  };
}

function envNumber(env: Environment, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${key} must be a number, got '${raw}'`, key);
  }
  return value;
}

function toTolerance(ratio: number | null | undefined, fallback: AmountTolerance): AmountTolerance {
  if (ratio === undefined) {
    return fallback;
  }
  return ratio === null ? UNBOUNDED_TOLERANCE : ratioTolerance(ratio);
}

function matcherParams(defaults: MatcherParams, section: MatcherFileSection): MatcherParams {
  return {
    descriptionHints: defaults.descriptionHints,
    approxBefore: section.approxBefore ?? defaults.approxBefore,
    approxAfter: section.approxAfter ?? defaults.approxAfter,
    amountTolerance: toTolerance(section.amountRatio, defaults.amountTolerance),
  };
}

/**
 * Builds the configuration from environment variables, layered over the JSON
 * file named by FORECASTER_CONFIG when set.
 *
 * Environment variables:
 * - FORECASTER_CONFIG: path of a JSON configuration file
 * - FORECASTER_CURRENCY: currency of new amounts
 * - FORECASTER_APPROX_DAYS: planned operation date tolerance, both sides
 * - FORECASTER_AMOUNT_RATIO: planned operation amount tolerance
 * - LOG_LEVEL: DEBUG, LOG, WARN or ERROR
 */
export function loadConfig(env: Environment = process.env): ForecasterConfig {
  const file: ConfigFile = env.FORECASTER_CONFIG ? readConfigFile(env.FORECASTER_CONFIG) : {};

  const approxDays = readDays(envNumber(env, 'FORECASTER_APPROX_DAYS'), 'FORECASTER_APPROX_DAYS');
  const amountRatio = readRatio(envNumber(env, 'FORECASTER_AMOUNT_RATIO'), 'FORECASTER_AMOUNT_RATIO');
  const plannedSection: MatcherFileSection = {
    approxBefore: approxDays ?? file.plannedOperation?.approxBefore,
    approxAfter: approxDays ?? file.plannedOperation?.approxAfter,
    amountRatio: amountRatio ?? file.plannedOperation?.amountRatio,
  };

  const rawLevel = env.LOG_LEVEL || file.logLevel;
  const logLevel = rawLevel === undefined ? LogLevel.WARN : parseLogLevel(rawLevel);
  if (logLevel === null) {
    throw new ConfigError(`Unknown log level '${rawLevel}'`, 'LOG_LEVEL');
  }

  return {
    defaultCurrency: env.FORECASTER_CURRENCY || file.defaultCurrency || DEFAULT_CURRENCY,
    plannedOperationMatcher: matcherParams(DEFAULT_MATCHER_PARAMS, plannedSection),
    budgetMatcher: matcherParams(BUDGET_MATCHER_DEFAULTS, file.budget ?? {}),
    logLevel,
  };
}

/**
 * Reads a .env file into process.env, then loads the configuration from it.
 */
export function loadConfigFromEnvironment(): ForecasterConfig {
  dotenv.config();
  return loadConfig(process.env);
}

export function applyLogLevel(config: ForecasterConfig): void {
  setLogLevel(config.logLevel);
}
