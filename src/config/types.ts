import { z } from 'zod';

export const warningModeSchema = z.enum(['log', 'silent']);

export type TWarningMode = z.infer<typeof warningModeSchema>;

/**
 * Full session configuration. Every key is required once defaults are applied.
 */
export const sessionConfigSchema = z
  .object({
    /** Port type used by createPort when none is given */
    defaultPortType: z.string().min(1),
    /** Names no node may take */
    reservedNames: z.array(z.string()),
    /** Create the node type schema's built-in ports on every new node */
    seedBuiltinPorts: z.boolean(),
    /** Capacity of the compiled pattern cache */
    matcherCacheSize: z.number().int().positive(),
    /** Where session warnings go */
    warnings: warningModeSchema,
    /** Node type schema file; null uses the bundled one */
    schemaPath: z.string().min(1).nullable(),
  })
  .strict();

export type TSessionConfig = z.infer<typeof sessionConfigSchema>;

/** What a config file, the environment or a caller may supply. */
export const partialSessionConfigSchema = sessionConfigSchema.partial();

export type TPartialSessionConfig = z.infer<typeof partialSessionConfigSchema>;
