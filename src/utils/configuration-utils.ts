import fs from 'fs';
import lodash from 'lodash';

import {ApplicationConfig} from '@loopback/core';

import {ObjectUtils} from './object-utils';
import {StringUtils} from './string-utils';

export interface AppCustomConfig extends ApplicationConfig {
  appCode: string;
  datasource: AppCustomDatasourceConfig;
  envName: string;
  allowSchemaMigration: boolean;
  security: AppCustomSecurityConfig;
  access: AppCustomAccessConfig;
  logging: AppCustomLoggingConfig;
  errorHandling: AppCustomErrorHandlingConfig;
}

export interface AppCustomDatasourceConfig {
  name: string;
  connector: string;
  enableTransactions: boolean;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
}

export interface AppCustomErrorHandlingConfig {
  enableRollbar: boolean;
  rollbarToken: string;
}

export interface AppCustomLoggingConfig {
  rootLevel: string;
  datasourceLevel: string;
  securityLevel: string;
  serviceLevel: string;
}

export interface AppCustomSecurityConfig {
  realm: string;
  tokenSecret: string;
  tokenIssuer: string;
  tokenAudience: string;
  exposeErrorDetails: boolean;
  algorithm: 'HS256';
}

export interface AppCustomAccessConfig {
  /** Maximum stay of an equipment item, applied when an entry is registered. */
  maxStayDays: number;
  /** Lease of the per-equipment lock taken while registering an entry (ms). */
  entryLockDuration: number;
  /** How long a concurrent entry waits for that lock before giving up (ms). */
  entryLockTimeout: number;
  entryLockRetryEvery: number;
}

export abstract class ConfigurationUtils {
  private static commonConfiguration: AppCustomConfig =
    ConfigurationUtils.readConfigurationFromFile('config-common.json');

  private static builtConfiguration: AppCustomConfig | undefined;

  static buildConfiguration(
    envName: string | undefined = undefined,
  ): AppCustomConfig {
    if (!envName) {
      envName = ConfigurationUtils.getEnv();
    }

    const configFile = `config-${envName.toLowerCase()}.json`;
    const profiledConfiguration = ConfigurationUtils.readConfigurationFromFile(
      configFile,
      {optional: true},
    );

    if (!profiledConfiguration) {
      throw new Error(
        `Missing profile configuration. Is the profile "${envName.toLowerCase()}" correct? Is the configuration file "${configFile}" present?`,
      );
    }

    const merged: AppCustomConfig = lodash.merge(
      lodash.merge({}, this.commonConfiguration),
      profiledConfiguration,
    );

    // replace placeholders
    let stringified = JSON.stringify(merged);

    stringified = StringUtils.format(stringified, k =>
      this.resolveProperty(k),
    );

    return JSON.parse(stringified);
  }

  static resolveProperty(key: string): string | null {
    if (!key.toLowerCase().startsWith('env.')) {
      return null;
    }

    const resolved = process.env[key.substring(4)];
    if (!ObjectUtils.isDefined(resolved)) {
      return null;
    }

    // escape for embedding into the stringified configuration
    const strfd = JSON.stringify(resolved);
    return strfd.substring(1, strfd.length - 1);
  }

  static getConfig(): AppCustomConfig {
    if (!ConfigurationUtils.builtConfiguration) {
      ConfigurationUtils.builtConfiguration =
        ConfigurationUtils.buildConfiguration();
    }
    return ConfigurationUtils.builtConfiguration;
  }

  static getEnv(): string {
    const key = 'NODE_ENV';
    return (
      process.env[
        key + '_' + ObjectUtils.require(this.commonConfiguration, 'appCode')
      ] ??
      process.env[key] ??
      'local'
    );
  }

  static readConfigurationFromFile(name: string): AppCustomConfig;
  static readConfigurationFromFile(
    name: string,
    options: {optional: boolean},
  ): Partial<AppCustomConfig> | null;
  static readConfigurationFromFile(
    name: string,
    options?: {optional: boolean},
  ): Partial<AppCustomConfig> | null {
    const fullpath = './src/config/' + name;
    if (!fs.existsSync(fullpath)) {
      if (options?.optional) {
        return null;
      }
      throw new Error('File not found: ' + fullpath);
    }
    return JSON.parse(fs.readFileSync(fullpath).toString());
  }
}
