import { config as dotenvConfig } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema, type AppConfig } from './schema.js';
import { ConfigurationError, ErrorCode } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ProtocolConfig, ProtocolRegistry, Thresholds } from '../core/types/protocols.js';

const logger = createLogger('Config');

// Load environment variables
dotenvConfig();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Resolve environment variable placeholders in config
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    // Replace ${VAR_NAME} with environment variable value
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return env[varName] || '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

// Load YAML config file
function loadYamlConfig(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }
  const content = readFileSync(path, 'utf-8');
  const parsed: unknown = parseYaml(content);
  return isRecord(parsed) ? parsed : {};
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

// Merge configs with environment variables taking precedence
function mergeConfigs(yamlConfig: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {
    app: {
      environment: env['NODE_ENV'],
      logLevel: env['LOG_LEVEL'],
    },
    notifications: {
      channel: env['NOTIFICATION_CHANNEL'],
      slackWebhookUrl: env['SLACK_WEBHOOK_URL'],
      telegramBotToken: env['TELEGRAM_BOT_TOKEN'],
      telegramChatId: env['TELEGRAM_CHAT_ID'],
    },
    api: {
      port: toNumber(env['API_PORT']),
    },
    storage: {
      databasePath: env['DATABASE_PATH'],
    },
  };

  // Deep merge, with env taking precedence
  return deepMerge(yamlConfig, envConfig);
}

// Deep merge utility
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null || value === '') {
      continue;
    }
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else if (isRecord(value)) {
      result[key] = deepMerge({}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

// Drop empty placeholder values so schema defaults apply
function pruneEmpty(obj: Record<string, unknown>): Record<string, unknown> {
  return deepMerge({}, obj);
}

// Load and validate configuration
export function loadConfig(
  configPath = process.env['CONFIG_PATH'] || './config/config.yaml',
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const rawYaml = loadYamlConfig(configPath);
  const resolved = resolveEnvVars(rawYaml, env);
  const merged = mergeConfigs(isRecord(resolved) ? pruneEmpty(resolved) : {}, env);

  const result = configSchema.safeParse(merged);

  if (!result.success) {
    logger.error('Configuration validation failed:');
    const issues = result.error.errors.map((error) => `${error.path.join('.')}: ${error.message}`);
    for (const issue of issues) {
      logger.error(`  - ${issue}`);
    }
    throw new ConfigurationError('Invalid configuration', ErrorCode.InvalidConfiguration, { issues });
  }

  return result.data;
}

// Attach ids to the protocol map
export function toProtocolRegistry(config: AppConfig): ProtocolRegistry {
  const registry: ProtocolRegistry = {};
  for (const [id, entry] of Object.entries(config.protocols)) {
    const protocol: ProtocolConfig = { id, ...entry };
    registry[id] = protocol;
  }
  return registry;
}

export function getThresholds(config: AppConfig): Thresholds {
  return { ...config.thresholds };
}

// Singleton config instance for process wiring
let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

// Re-export types
export type { AppConfig };
