/**
 * Project Configuration Loader
 *
 * Reads `.pendency/config.json`, applies environment overrides, validates
 * with zod and returns a deep-frozen configuration.
 *
 * @module
 */

import { ConfigError, ErrorCode } from "../errors.js";
import { fileExists, getConfigPath, readJson, writeJson } from "../../utils/index.js";
import {
  ProjectConfigSchema,
  formatZodError,
  safeValidate,
  type ProjectConfig,
  type ProjectConfigInput,
} from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("config");

export const ENV_TOKEN = "PENDENCY_SURVEY_TOKEN";
export const ENV_BASE_URL = "PENDENCY_SURVEY_URL";

export type Env = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Freezes an object graph in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Replaces the survey token and base URL from the environment when set
 */
export function applyEnvOverrides(raw: unknown, env: Env = process.env): unknown {
  if (!isRecord(raw)) return raw;

  const token = env[ENV_TOKEN]?.trim();
  const baseUrl = env[ENV_BASE_URL]?.trim();
  if (!token && !baseUrl) return raw;

  const survey = isRecord(raw.survey) ? { ...raw.survey } : {};
  if (token) survey.token = token;
  if (baseUrl) survey.baseUrl = baseUrl;
  return { ...raw, survey };
}

/**
 * Validates a raw configuration object
 */
export function parseConfig(raw: unknown, env: Env = process.env): ProjectConfig {
  const result = safeValidate(ProjectConfigSchema, applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigError(`Invalid project configuration (${issues.length} issue(s))`, ErrorCode.CONFIG_INVALID, {
      issues,
    });
  }
  return deepFreeze(result.data);
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: Env;
}

/**
 * Loads the project configuration from disk
 */
export function loadConfig(options: LoadConfigOptions = {}): ProjectConfig {
  const configPath = options.configPath ?? getConfigPath();

  let raw: unknown;
  try {
    raw = readJson(configPath);
  } catch (error) {
    throw new ConfigError(
      `Cannot read configuration at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIG_UNREADABLE,
      { configPath }
    );
  }

  if (raw === null) {
    throw new ConfigError(
      `No configuration found at ${configPath}. Run "pendency init" first.`,
      ErrorCode.CONFIG_NOT_FOUND,
      { configPath }
    );
  }

  const config = parseConfig(raw, options.env);
  logger.debug({ configPath, project: config.name }, "Configuration loaded");
  return config;
}

// =============================================================================
// Template
// =============================================================================

export interface TemplateOptions {
  name: string;
  baseUrl?: string;
  masterFormId?: string;
  revisitFormId?: string;
}

/**
 * Starting configuration for a new project, using the usual household
 * survey layout (status codes "01" complete, "04"/"05" closed on revisit).
 */
export function defaultConfigTemplate(options: TemplateOptions): ProjectConfigInput {
  const address = [
    "info_gerais/tipo_logradouro",
    "info_gerais/endereco_name",
    "info_gerais/numero",
    "info_gerais/complemento",
  ];
  return {
    name: options.name,
    survey: {
      baseUrl: options.baseUrl ?? "https://kf.kobotoolbox.org",
      token: "",
    },
    forms: {
      master: {
        formId: options.masterFormId ?? "MASTER_FORM_ID",
        fields: {
          householdId: "household_id",
          status: "info_gerais/status",
          address,
          details: {
            census_tract: "info_gerais/setor_censo",
            subsector: "info_gerais/subsetor",
            reference: "referencia",
          },
        },
      },
      revisit: {
        formId: options.revisitFormId ?? "REVISIT_FORM_ID",
        fields: {
          householdId: "household_id",
          status: "info_gerais/status",
          address,
        },
      },
    },
    statusVocabulary: {
      master: { complete: ["01"], incomplete: [], unknownAs: "incomplete" },
      revisit: { complete: ["01", "04", "05"], incomplete: [], unknownAs: "incomplete" },
    },
  };
}

export interface WriteTemplateResult {
  configPath: string;
  created: boolean;
}

/**
 * Writes a starting configuration unless one exists (or `force` is set)
 */
export function writeConfigTemplate(
  options: TemplateOptions & { configPath?: string; force?: boolean }
): WriteTemplateResult {
  const configPath = options.configPath ?? getConfigPath();
  if (fileExists(configPath) && !options.force) {
    return { configPath, created: false };
  }
  writeJson(configPath, defaultConfigTemplate(options));
  logger.info({ configPath }, "Configuration template written");
  return { configPath, created: true };
}
