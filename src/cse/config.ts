import { z } from "zod"

/**
 * CSE identity and feature switches
 */
export const cseConfigSchema = z.object({
  /**
   * CSE Type, `1`: IN-CSE, `2`: MN-CSE, `3`: ASN-CSE
   */
  cseType: z.union([z.literal(1), z.literal(2), z.literal(3)]).default(1),
  /**
   * CSE-ID, SP-relative
   */
  csi: z
    .string()
    .regex(/^\/[^/]+$/, "csi must start with a single '/'")
    .default("/id-in"),
  /**
   * Resource id of the CSEBase
   */
  ri: z.string().min(1).default("id-in"),
  /**
   * Resource name of the CSEBase, the first segment of every structured path
   */
  rn: z.string().min(1).default("cse-in"),
  /**
   * Service provider id (second segment of an absolute address)
   */
  spid: z.string().min(1).default("sp.example.com"),
  poa: z.array(z.string()).default([]),
  enableTransitRequests: z.boolean().default(true),
  enableACPChecks: z.boolean().default(true),
  /**
   * Originator that passes every access check
   */
  adminOriginator: z.string().default("CAdmin"),
  /**
   * Regular expressions, an AE registration must match one of them
   */
  allowedAEOriginators: z.array(z.string()).default(["C.*", "S.*"]),
  allowedCSROriginators: z.array(z.string()).default(["/.*"]),
  /**
   * Seconds added to "now" for a default `et`
   */
  expirationDelta: z
    .number()
    .int()
    .positive()
    .default(60 * 60 * 24 * 365),
  /**
   * Remove resources whose `et` has passed
   */
  enableResourceExpiration: z.boolean().default(true),
  /**
   * Seconds between two sweeps for expired resources
   */
  checkExpirationsInterval: z.number().int().positive().default(60),
  /**
   * Seconds, the farthest an `et` may lie ahead. Later ones are cut back.
   */
  maxExpirationDelta: z
    .number()
    .int()
    .positive()
    .default(60 * 60 * 24 * 365 * 5),
})

export type CSEConfig = z.infer<typeof cseConfigSchema> & {
  clock: () => Date
}

export type CSEOptions = z.input<typeof cseConfigSchema> & {
  clock?: () => Date
}

/**
 * Apply defaults and validate.
 *
 * @throws `ZodError` for an invalid option
 */
export function defineConfig(options: CSEOptions = {}): CSEConfig {
  const { clock, ...rest } = options
  return {
    ...cseConfigSchema.parse(rest),
    clock: clock ?? (() => new Date()),
  }
}

/**
 * CSE-ID without the leading `/`
 */
export function bareCsi(config: Pick<CSEConfig, "csi">) {
  return config.csi.startsWith("/") ? config.csi.substring(1) : config.csi
}
