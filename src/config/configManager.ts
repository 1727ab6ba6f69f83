import path from 'path';
import { DownloaderConfig, MirrorEndpoint, PartialDownloaderConfig } from '../types';
import { defaultConfig, ENV_KEYS } from './default';
import { FileUtils } from '../utils/fileUtils';
import { isObject, nonEmptyString } from '../utils/guards';
import { isLogLevelName, logger } from '../utils/logger';

function cloneDefaults(): DownloaderConfig {
  return {
    ...defaultConfig,
    headers: { ...defaultConfig.headers },
    catalog: { ...defaultConfig.catalog, catalogUrls: [...defaultConfig.catalog.catalogUrls] },
    resolver: { ...defaultConfig.resolver },
    transfer: {
      ...defaultConfig.transfer,
      mirrors: defaultConfig.transfer.mirrors.map(mirror => ({ ...mirror })),
    },
  };
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function mirrorList(value: unknown): MirrorEndpoint[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const mirrors: MirrorEndpoint[] = [];
  for (const entry of value) {
    if (!isObject(entry)) continue;
    const name = nonEmptyString(entry.name);
    const baseUrl = nonEmptyString(entry.baseUrl);
    if (name && baseUrl) {
      mirrors.push({ name, baseUrl });
    }
  }
  return mirrors;
}

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Reads the subset of a parsed config.json that matches DownloaderConfig.
 * Unknown keys and values of the wrong type are ignored.
 */
export function parsePartialConfig(raw: unknown): PartialDownloaderConfig {
  const partial: PartialDownloaderConfig = {};
  if (!isObject(raw)) return partial;

  setIfDefined(partial, 'outputDir', nonEmptyString(raw.outputDir));
  setIfDefined(partial, 'exportPath', nonEmptyString(raw.exportPath));
  if (typeof raw.logLevel === 'string' && isLogLevelName(raw.logLevel)) {
    partial.logLevel = raw.logLevel;
  }

  if (isObject(raw.headers)) {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw.headers)) {
      if (typeof value === 'string') headers[key] = value;
    }
    partial.headers = headers;
  }

  if (isObject(raw.catalog)) {
    const catalog: NonNullable<PartialDownloaderConfig['catalog']> = {};
    setIfDefined(catalog, 'versionUrl', nonEmptyString(raw.catalog.versionUrl));
    setIfDefined(catalog, 'catalogUrls', stringList(raw.catalog.catalogUrls));
    setIfDefined(catalog, 'requestTimeout', optionalNumber(raw.catalog.requestTimeout));
    setIfDefined(catalog, 'expectedTotal', optionalNumber(raw.catalog.expectedTotal));
    partial.catalog = catalog;
  }

  if (isObject(raw.resolver)) {
    const resolver: NonNullable<PartialDownloaderConfig['resolver']> = {};
    setIfDefined(resolver, 'detailsBaseUrl', nonEmptyString(raw.resolver.detailsBaseUrl));
    setIfDefined(resolver, 'requestTimeout', optionalNumber(raw.resolver.requestTimeout));
    partial.resolver = resolver;
  }

  if (isObject(raw.transfer)) {
    const transfer: NonNullable<PartialDownloaderConfig['transfer']> = {};
    setIfDefined(transfer, 'mirrors', mirrorList(raw.transfer.mirrors));
    setIfDefined(transfer, 'requestTimeout', optionalNumber(raw.transfer.requestTimeout));
    setIfDefined(transfer, 'minDocumentBytes', optionalNumber(raw.transfer.minDocumentBytes));
    setIfDefined(transfer, 'skipExisting', optionalBoolean(raw.transfer.skipExisting));
    setIfDefined(transfer, 'delayBetweenRecords', optionalNumber(raw.transfer.delayBetweenRecords));
    partial.transfer = transfer;
  }

  return partial;
}

export class ConfigManager {
  private config: DownloaderConfig;
  private configPath: string;

  constructor(configPath?: string) {
    this.config = cloneDefaults();
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
  }

  async loadConfig(): Promise<DownloaderConfig> {
    try {
      const existingConfig = await FileUtils.readJSON(this.configPath);

      if (existingConfig !== null) {
        this.config = this.mergeConfigs(cloneDefaults(), parsePartialConfig(existingConfig));
        logger.debug(`Loaded configuration from ${this.configPath}`);
      } else {
        logger.debug('No configuration file found, using default config');
      }
    } catch (error) {
      logger.error(`Failed to load configuration from ${this.configPath}:`, error);
      logger.info('Using default configuration');
      this.config = cloneDefaults();
    }

    return this.config;
  }

  getConfig(): DownloaderConfig {
    return this.config;
  }

  updateConfig(updates: PartialDownloaderConfig): void {
    this.config = this.mergeConfigs(this.config, updates);
  }

  /**
   * Applies TEXTBOOK_* overrides. Callers load `.env` through dotenv before
   * handing process.env in.
   */
  applyEnvironment(env: NodeJS.ProcessEnv): void {
    const outputDir = nonEmptyString(env[ENV_KEYS.OUTPUT_DIR]);
    const exportPath = nonEmptyString(env[ENV_KEYS.EXPORT_PATH]);
    const logLevel = nonEmptyString(env[ENV_KEYS.LOG_LEVEL]);
    const minBytes = nonEmptyString(env[ENV_KEYS.MIN_DOCUMENT_BYTES]);

    if (outputDir) this.config.outputDir = outputDir;
    if (exportPath) this.config.exportPath = exportPath;

    if (logLevel) {
      if (isLogLevelName(logLevel)) {
        this.config.logLevel = logLevel;
      } else {
        logger.warn(`Ignoring unknown ${ENV_KEYS.LOG_LEVEL}: ${logLevel}`);
      }
    }

    if (minBytes) {
      const parsed = Number(minBytes);
      if (Number.isInteger(parsed) && parsed >= 0) {
        this.config.transfer.minDocumentBytes = parsed;
      } else {
        logger.warn(`Ignoring invalid ${ENV_KEYS.MIN_DOCUMENT_BYTES}: ${minBytes}`);
      }
    }
  }

  setOutputDir(dir: string): void {
    this.config.outputDir = dir;
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { catalog, resolver, transfer } = this.config;

    if (!this.config.outputDir || this.config.outputDir.trim() === '') {
      errors.push('Output directory is required');
    }

    if (!catalog.versionUrl && catalog.catalogUrls.length === 0) {
      errors.push('Either a catalog version URL or explicit catalog URLs are required');
    }

    if (!resolver.detailsBaseUrl) {
      errors.push('Resolver details base URL is required');
    }

    if (transfer.mirrors.length === 0) {
      errors.push('At least one mirror must be configured');
    }

    for (const [label, timeout] of [
      ['Catalog', catalog.requestTimeout],
      ['Resolver', resolver.requestTimeout],
      ['Transfer', transfer.requestTimeout],
    ] as const) {
      if (timeout < 1000) {
        errors.push(`${label} request timeout must be at least 1000ms`);
      }
    }

    if (transfer.minDocumentBytes < 0) {
      errors.push('Minimum document size cannot be negative');
    }

    if (transfer.delayBetweenRecords < 0) {
      errors.push('Delay between records cannot be negative');
    }

    if (catalog.expectedTotal !== undefined && catalog.expectedTotal < 1) {
      errors.push('Expected catalog total must be greater than 0');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  private mergeConfigs(base: DownloaderConfig, updates: PartialDownloaderConfig): DownloaderConfig {
    return {
      ...base,
      outputDir: updates.outputDir ?? base.outputDir,
      exportPath: updates.exportPath ?? base.exportPath,
      logLevel: updates.logLevel ?? base.logLevel,
      headers: { ...base.headers, ...updates.headers },
      catalog: { ...base.catalog, ...updates.catalog },
      resolver: { ...base.resolver, ...updates.resolver },
      transfer: { ...base.transfer, ...updates.transfer },
    };
  }
}
