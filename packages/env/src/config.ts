import { z } from 'zod';

const optionalFlag = z
  .enum(['true', 'false'])
  .optional()
  .transform((val) => (val === undefined ? undefined : val === 'true'));

const envSchema = z.object({
  COINRECKON_ALL_AIRDROPS_ARE_GIFTS: optionalFlag,
  COINRECKON_COUNTRY: z.string().trim().min(1).optional(),
  COINRECKON_FIAT: z.string().trim().min(1).optional(),
  COINRECKON_MULTI_DEPOT: optionalFlag,
  COINRECKON_PRINCIPLE: z
    .string()
    .transform((val) => val.trim().toLowerCase())
    .pipe(z.enum(['fifo', 'lifo']))
    .optional(),
  COINRECKON_TAX_YEAR: z
    .string()
    .regex(/^\d{4}$/, { message: 'Tax year must be a four-digit year' })
    .transform((val) => parseInt(val, 10))
    .optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Taxation settings taken from the environment. Every field is optional;
 * command-line flags and built-in defaults fill the gaps.
 */
export interface TaxationEnvDefaults {
  allAirdropsAreGifts?: boolean | undefined;
  fiatCurrency?: string | undefined;
  jurisdiction?: string | undefined;
  method?: 'fifo' | 'lifo' | undefined;
  multiDepot?: boolean | undefined;
  taxYear?: number | undefined;
}

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(source: NodeJS.ProcessEnv = process.env): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(source);
  }
  return validatedEnv;
}

/**
 * Validate an environment map without caching.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Map COINRECKON_* variables onto taxation settings.
 */
export function toTaxationDefaults(env: ValidatedEnv): TaxationEnvDefaults {
  return {
    allAirdropsAreGifts: env.COINRECKON_ALL_AIRDROPS_ARE_GIFTS,
    fiatCurrency: env.COINRECKON_FIAT?.toUpperCase(),
    jurisdiction: env.COINRECKON_COUNTRY?.toUpperCase(),
    method: env.COINRECKON_PRINCIPLE,
    multiDepot: env.COINRECKON_MULTI_DEPOT,
    taxYear: env.COINRECKON_TAX_YEAR,
  };
}

/**
 * Taxation defaults from the process environment.
 */
export function getTaxationEnvDefaults(): TaxationEnvDefaults {
  return toTaxationDefaults(validateEnv());
}
