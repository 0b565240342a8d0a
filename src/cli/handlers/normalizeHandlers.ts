import { createNameFilter } from '../../core/filter';
import { normalizeName } from '../../core/normalize';
import type { NormalizeNamesInput } from '../schemas/normalizeSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { isConfigError, resolveConfig } from '../helpers';

export async function handleNormalizeNames(input: NormalizeNamesInput): Promise<CLIResult | CLIError> {
  const config = await resolveConfig(input.config);
  if (isConfigError(config)) return config;

  const filter = createNameFilter(config);
  const names = input.names.map((raw) => {
    const canonical = normalizeName(raw);
    const verdict = filter.explain(canonical);
    return {
      input: raw,
      canonical,
      accepted: verdict.accepted,
      ...(verdict.accepted ? {} : { rejectedBy: verdict.reason, match: verdict.match }),
    };
  });

  return success({ names });
}
