// Central Configuration Module for the BRUTE client
// Consolidates portal endpoints, credential location and scraping variants

import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';

export type RichTextVariant = 'full' | 'evaluation-only';

export interface AppConfig {
  // Portal Configuration
  portal: {
    baseUrl: string;
    idpHost: string;
    cookiePrefix: string;
  };

  // Evaluation form Configuration
  evaluation: {
    richTextVariant: RichTextVariant;
  };

  // Credential file Configuration
  credentials: {
    path: string;
  };

  debugMode: boolean;
}

// Default configuration values
export const DEFAULT_CONFIG: AppConfig = {
  portal: {
    baseUrl: 'https://cw.felk.cvut.cz/brute/',
    idpHost: 'idp2.civ.cvut.cz',
    cookiePrefix: '_shibsession_'
  },

  evaluation: {
    richTextVariant: 'full'
  },

  credentials: {
    path: path.join(os.homedir(), '.config', 'brute-client', 'cookie')
  },

  debugMode: false
};

// Settings that can be overridden from the environment
export interface UserSettings {
  baseUrl?: string;
  idpHost?: string;
  cookiePrefix?: string;
  richTextVariant?: RichTextVariant;
  credentialsPath?: string;
  debugMode?: boolean;
}

export const ENV_KEYS = {
  baseUrl: 'BRUTE_BASE_URL',
  idpHost: 'BRUTE_IDP_HOST',
  cookiePrefix: 'BRUTE_COOKIE_PREFIX',
  richTextVariant: 'BRUTE_RICH_TEXT_VARIANT',
  credentialsPath: 'BRUTE_COOKIE_FILE',
  debugMode: 'BRUTE_DEBUG'
} as const;

function cloneConfig(config: AppConfig): AppConfig {
  return {
    portal: { ...config.portal },
    evaluation: { ...config.evaluation },
    credentials: { ...config.credentials },
    debugMode: config.debugMode
  };
}

function isRichTextVariant(value: string): value is RichTextVariant {
  return value === 'full' || value === 'evaluation-only';
}

/**
 * Configuration manager class
 */
export class ConfigManager {
  private config: AppConfig;

  constructor(overrides: UserSettings = {}) {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.updateFromUserSettings(overrides);
  }

  /**
   * Get the complete configuration
   */
  getConfig(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Update configuration with user settings
   */
  updateFromUserSettings(settings: UserSettings): void {
    if (settings.baseUrl !== undefined) {
      // Relative paths are resolved against the base, so it must end with a slash
      this.config.portal.baseUrl = settings.baseUrl.endsWith('/') ? settings.baseUrl : `${settings.baseUrl}/`;
    }
    if (settings.idpHost !== undefined) {
      this.config.portal.idpHost = settings.idpHost;
    }
    if (settings.cookiePrefix !== undefined) {
      this.config.portal.cookiePrefix = settings.cookiePrefix;
    }
    if (settings.richTextVariant !== undefined) {
      this.config.evaluation.richTextVariant = settings.richTextVariant;
    }
    if (settings.credentialsPath !== undefined) {
      this.config.credentials.path = settings.credentialsPath;
    }
    if (settings.debugMode !== undefined) {
      this.config.debugMode = settings.debugMode;
    }
  }

  /**
   * Load user settings from environment variables
   */
  loadUserSettings(env: NodeJS.ProcessEnv = process.env): void {
    const validatedSettings: UserSettings = {};

    const baseUrl = env[ENV_KEYS.baseUrl]?.trim();
    if (baseUrl) {
      validatedSettings.baseUrl = baseUrl;
    }

    const idpHost = env[ENV_KEYS.idpHost]?.trim();
    if (idpHost) {
      validatedSettings.idpHost = idpHost;
    }

    const cookiePrefix = env[ENV_KEYS.cookiePrefix]?.trim();
    if (cookiePrefix) {
      validatedSettings.cookiePrefix = cookiePrefix;
    }

    const variant = env[ENV_KEYS.richTextVariant]?.trim();
    if (variant) {
      if (isRichTextVariant(variant)) {
        validatedSettings.richTextVariant = variant;
      } else {
        console.warn(`ConfigManager: Ignoring unknown ${ENV_KEYS.richTextVariant} "${variant}"`);
      }
    }

    const credentialsPath = env[ENV_KEYS.credentialsPath]?.trim();
    if (credentialsPath) {
      validatedSettings.credentialsPath = credentialsPath;
    }

    const debug = env[ENV_KEYS.debugMode]?.trim().toLowerCase();
    if (debug) {
      if (debug === '1' || debug === 'true') {
        validatedSettings.debugMode = true;
      } else if (debug === '0' || debug === 'false') {
        validatedSettings.debugMode = false;
      } else {
        console.warn(`ConfigManager: Ignoring ${ENV_KEYS.debugMode}="${debug}", expected true or false`);
      }
    }

    this.updateFromUserSettings(validatedSettings);
  }

  /**
   * Reset to default settings
   */
  resetToDefaults(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
  }

  getPortalConfig(): AppConfig['portal'] {
    return { ...this.config.portal };
  }

  getEvaluationConfig(): AppConfig['evaluation'] {
    return { ...this.config.evaluation };
  }

  getCredentialsConfig(): AppConfig['credentials'] {
    return { ...this.config.credentials };
  }

  isDebugMode(): boolean {
    return this.config.debugMode;
  }

  /**
   * Resolve a portal-relative path such as `teacher/course/12` to an absolute URL
   */
  resolveUrl(relative: string): string {
    return new URL(relative, this.config.portal.baseUrl).toString();
  }

  /**
   * Path component of the base URL, e.g. `/brute/`
   */
  getBasePath(): string {
    return new URL(this.config.portal.baseUrl).pathname;
  }

  /**
   * Validate configuration values
   */
  validate(): { isValid: boolean; errors: string[] } {
    const errors: string[] = [];

    try {
      const url = new URL(this.config.portal.baseUrl);
      if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        errors.push('Portal base URL must use http or https');
      }
    } catch {
      errors.push('Portal base URL is not a valid URL');
    }

    if (!this.config.portal.idpHost) {
      errors.push('Identity provider host must not be empty');
    }

    if (!this.config.portal.cookiePrefix) {
      errors.push('Cookie prefix must not be empty');
    }

    if (!isRichTextVariant(this.config.evaluation.richTextVariant)) {
      errors.push(`Unknown rich-text variant "${this.config.evaluation.richTextVariant}"`);
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}

// Global config manager instance
let globalConfigManager: ConfigManager | null = null;

/**
 * Get the global configuration manager instance
 */
export function getConfigManager(): ConfigManager {
  if (!globalConfigManager) {
    globalConfigManager = new ConfigManager();
  }
  return globalConfigManager;
}

/**
 * Initialize configuration (load `.env`, then the environment)
 */
export function initializeConfig(envFile?: string): ConfigManager {
  dotenv.config(envFile ? { path: envFile } : undefined);

  const configManager = getConfigManager();
  configManager.loadUserSettings();

  const validation = configManager.validate();
  if (!validation.isValid) {
    console.warn('ConfigManager: Configuration validation failed:', validation.errors);
  }

  if (configManager.isDebugMode()) {
    console.log('ConfigManager: Configuration initialized', {
      config: configManager.getConfig(),
      validation
    });
  }

  return configManager;
}
