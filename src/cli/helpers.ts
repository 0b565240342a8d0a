import { ConfigError, loadXrefConfig, mergeXrefConfig, type XrefConfig } from '../core/config';
import type { CLIError } from './types';
import { error, ErrorHints, ErrorReasons } from './types';

/**
 * Load the run configuration and apply command-line overrides.
 *
 * @param configPath - Explicit config file; `xref.config.json` in the working directory otherwise
 * @returns Configuration or a `config_invalid` error
 */
export async function resolveConfig(
  configPath: string | undefined,
  overrides?: Partial<XrefConfig>
): Promise<XrefConfig | CLIError> {
  try {
    const base = await loadXrefConfig({ configPath });
    return mergeXrefConfig(base, overrides);
  } catch (e) {
    if (e instanceof ConfigError) {
      return error(ErrorReasons.CONFIG_INVALID, {
        message: e.message,
        issues: e.issues,
        hint: ErrorHints.CONFIG_INVALID,
      });
    }
    throw e;
  }
}

export function isConfigError(value: XrefConfig | CLIError): value is CLIError {
  return 'ok' in value && value.ok === false;
}
