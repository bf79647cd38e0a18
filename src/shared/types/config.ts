/**
 * Shared configuration types.
 *
 * ClipkeepConfig is derived from the Zod schema in `shared/schemas/config-schema.ts`.
 * That schema is the single source of truth for shape, defaults, and validation.
 */

export type {
  ClipkeepConfigParsed as ClipkeepConfig,
  ClipkeepConfigParsed,
  ConfigKey,
} from '../schemas/config-schema';
