import { BITCOIN, DEFAULTS, ENV_VARS, FEATURE_FLAGS } from '@common/constants/config';
import { ConfigurationError, getErrorMessage } from '@common/utils/error-handler';
import { Injectable, Logger } from '@nestjs/common';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { isAbsolute, join } from 'path';
import { RpcConnectionConfig } from '@types';

/**
 * Settings for the scheduled difficulty monitor
 */
export interface MonitoringConfig {
  enableDifficultyMonitoring: boolean;
  scanIntervalMs: number;
  blocksToScan: number;
}

/**
 * Settings for the winston logger
 */
export interface LoggingConfig {
  level: string;
  enableFileLogging: boolean;
  logDirectory: string;
}

/**
 * Configuration service with strict typing and validation
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly env: Record<string, string | undefined>;

  // Cached config values
  private monitoringConfig: MonitoringConfig | null = null;
  private rpcConfig: RpcConnectionConfig | null = null;

  /**
   * @param overrides Values taking precedence over the process environment and the .env file
   */
  constructor(overrides: Record<string, string> = {}) {
    const envFile = overrides[ENV_VARS.ENV_FILE] ?? process.env[ENV_VARS.ENV_FILE] ?? DEFAULTS.ENV_FILE;
    const envPath = isAbsolute(envFile) ? envFile : join(process.cwd(), envFile);

    let fileValues: Record<string, string> = {};
    try {
      if (fs.existsSync(envPath)) {
        fileValues = dotenv.parse(fs.readFileSync(envPath));
        this.logger.log(`Loaded environment variables from ${envPath}`);
      } else {
        this.logger.log('No .env file found, using process environment variables');
      }
    } catch (error) {
      this.logger.error(`Failed to load environment variables: ${getErrorMessage(error)}`);
    }

    this.env = { ...process.env, ...fileValues, ...overrides };
  }

  /**
   * Get a string value from environment variables
   */
  get(key: string, defaultValue?: string): string {
    return this.read(key, defaultValue, value => value);
  }

  /**
   * Get an optional string value
   */
  getOptional(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value === '' ? undefined : value;
  }

  /**
   * Get a numeric value from environment variables
   */
  getNumber(key: string, defaultValue?: number): number {
    return this.read(key, defaultValue, value => {
      const num = Number(value);
      if (isNaN(num)) {
        throw new Error(`Cannot convert "${value}" to a number`);
      }
      return num;
    });
  }

  /**
   * Get a boolean value from environment variables
   */
  getBoolean(key: string, defaultValue?: boolean): boolean {
    return this.read(key, defaultValue, value => {
      if (value.toLowerCase() === 'true' || value === '1') return true;
      if (value.toLowerCase() === 'false' || value === '0') return false;
      throw new Error(`Cannot convert "${value}" to a boolean`);
    });
  }

  /**
   * Get feature flag status
   */
  isFeatureEnabled(featureFlag: string, defaultValue = false): boolean {
    return this.getBoolean(featureFlag, defaultValue);
  }

  /**
   * Get the application port
   */
  getPort(): number {
    return this.getNumber(ENV_VARS.PORT, DEFAULTS.PORT);
  }

  getEnvironment(): string {
    return this.get(ENV_VARS.NODE_ENV, DEFAULTS.NODE_ENV);
  }

  /**
   * Get the log level
   */
  getLogLevel(): string {
    return this.get(ENV_VARS.LOG_LEVEL, DEFAULTS.LOG_LEVEL);
  }

  getLoggingConfig(): LoggingConfig {
    const directory = this.get(ENV_VARS.LOG_DIRECTORY, DEFAULTS.LOG_DIRECTORY);
    return {
      level: this.getLogLevel(),
      enableFileLogging: this.isFeatureEnabled(FEATURE_FLAGS.LOG_TO_FILE, true),
      logDirectory: isAbsolute(directory) ? directory : join(process.cwd(), directory),
    };
  }

  /**
   * Connection settings for the node's JSON-RPC interface.
   * RPC_URL wins over RPC_HOST/RPC_PORT when set.
   */
  getRpcConfig(): RpcConnectionConfig {
    if (!this.rpcConfig) {
      const host = this.get(ENV_VARS.RPC_HOST, BITCOIN.RPC.DEFAULT_HOST);
      const port = this.getNumber(ENV_VARS.RPC_PORT, BITCOIN.RPC.DEFAULT_PORT);
      const url = this.getOptional(ENV_VARS.RPC_URL) ?? `http://${host}:${port}`;

      const timeoutMs = this.getNumber(ENV_VARS.RPC_TIMEOUT_MS, DEFAULTS.REQUEST_TIMEOUT_MS);
      if (timeoutMs <= 0) {
        throw new ConfigurationError(`${ENV_VARS.RPC_TIMEOUT_MS} must be positive, got ${timeoutMs}`, ENV_VARS.RPC_TIMEOUT_MS);
      }

      this.rpcConfig = {
        url,
        username: this.getOptional(ENV_VARS.RPC_USER),
        password: this.getOptional(ENV_VARS.RPC_PASSWORD),
        timeoutMs,
        clientId: this.get(ENV_VARS.RPC_CLIENT_ID, BITCOIN.RPC.DEFAULT_CLIENT_ID),
      };
    }

    return this.rpcConfig;
  }

  /**
   * Get the complete monitoring configuration
   */
  getMonitoringConfig(): MonitoringConfig {
    if (!this.monitoringConfig) {
      const blocksToScan = this.getNumber(ENV_VARS.BLOCKS_TO_SCAN, DEFAULTS.BLOCKS_TO_SCAN);
      if (!Number.isInteger(blocksToScan) || blocksToScan < 1 || blocksToScan > BITCOIN.BLOCKS.MAX_ANALYSIS_BLOCKS) {
        throw new ConfigurationError(
          `${ENV_VARS.BLOCKS_TO_SCAN} must be an integer between 1 and ${BITCOIN.BLOCKS.MAX_ANALYSIS_BLOCKS}, got ${blocksToScan}`,
          ENV_VARS.BLOCKS_TO_SCAN,
        );
      }

      const scanIntervalSeconds = this.getNumber(ENV_VARS.SCAN_INTERVAL, DEFAULTS.SCAN_INTERVAL);
      if (scanIntervalSeconds <= 0) {
        throw new ConfigurationError(
          `${ENV_VARS.SCAN_INTERVAL} must be positive, got ${scanIntervalSeconds}`,
          ENV_VARS.SCAN_INTERVAL,
        );
      }

      this.monitoringConfig = {
        enableDifficultyMonitoring: this.isFeatureEnabled(FEATURE_FLAGS.ENABLE_DIFFICULTY_MONITORING, true),
        scanIntervalMs: scanIntervalSeconds * 1000,
        blocksToScan,
      };
    }

    return this.monitoringConfig;
  }

  /**
   * Read a value from environment variables with type conversion
   */
  private read<T>(key: string, defaultValue: T | undefined, transform: (value: string) => T): T {
    const value = this.env[key];

    if (value === undefined || value === '') {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new ConfigurationError(`Missing required environment variable: ${key}`, key);
    }

    try {
      return transform(value);
    } catch (error) {
      throw new ConfigurationError(`Failed to transform environment variable ${key}: ${getErrorMessage(error)}`, key);
    }
  }
}
