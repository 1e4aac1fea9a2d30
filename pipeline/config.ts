import { readFileSync } from 'node:fs'
import {
  type PipelineConfigProcessed,
  PipelineConfigSchema,
} from '@cuesmith/config'
import { InvalidConfigurationError } from './errors'

/**
 * Validate a pipeline configuration and fill in the defaults.
 *
 * @throws {InvalidConfigurationError} with the validation issues as details
 */
export function parseConfig(value: unknown): PipelineConfigProcessed {
  const parsed = PipelineConfigSchema.safeParse(value)
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InvalidConfigurationError(
      `Invalid pipeline configuration: ${summary}`,
      parsed.error.issues,
    )
  }
  return parsed.data
}

/**
 * Unvalidated values overriding the configuration file (e.g. CLI flags)
 */
export interface ConfigOverrides {
  captions?: Record<string, unknown>
  output?: Record<string, unknown>
}

/**
 * Drop keys whose value is undefined, so they don't hide the base value.
 */
function definedOnly(
  values: Record<string, unknown> = {},
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  )
}

/**
 * Merge overrides on top of a configuration, section by section.
 * Undefined overrides are ignored.
 */
export function mergeConfig(
  base: PipelineConfigProcessed,
  overrides: ConfigOverrides,
): { captions: Record<string, unknown>; output: Record<string, unknown> } {
  return {
    captions: { ...base.captions, ...definedOnly(overrides.captions) },
    output: { ...base.output, ...definedOnly(overrides.output) },
  }
}

/**
 * Load a JSON configuration file. Without a path, only the defaults are used.
 */
export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
): PipelineConfigProcessed {
  let fileConfig: unknown = {}
  if (configPath) {
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'))
    } catch (err) {
      throw new InvalidConfigurationError(
        `Unable to read configuration file ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
  }

  if (
    typeof fileConfig !== 'object' ||
    fileConfig === null ||
    Array.isArray(fileConfig)
  ) {
    throw new InvalidConfigurationError(
      `Configuration file ${configPath} must contain a JSON object`,
    )
  }

  // validate the file on its own first so its errors point at the file
  const base = parseConfig(fileConfig)
  return parseConfig(mergeConfig(base, overrides))
}
