import { z } from 'zod';

// ── Browser identifiers ─────────────────────────────────────

export const browserNameSchema = z.enum(['chrome', 'edge', 'firefox', 'safari']);

export type BrowserName = z.infer<typeof browserNameSchema>;

// ── CapabilityDescriptor ────────────────────────────────────

export const capabilityDescriptorSchema = z
  .object({
    name: z.string().min(1).optional(),
    browser: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(browserNameSchema),
    browserVersion: z.string().min(1).optional(),
    os: z.string().min(1).optional(),
    osVersion: z.string().min(1).optional(),
    device: z.string().min(1).optional(),
    realMobile: z.boolean().optional(),
  })
  .readonly();

export type CapabilityDescriptor = z.infer<typeof capabilityDescriptorSchema>;

export const capabilityMatrixSchema = z
  .array(capabilityDescriptorSchema)
  .min(1)
  .superRefine((matrix, ctx) => {
    const seen = new Set<string>();
    matrix.forEach((descriptor, index) => {
      const label = describeCapability(descriptor);
      if (seen.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `Duplicate capability "${label}"; give it a distinct name`,
        });
      }
      seen.add(label);
    });
  });

// ── Labels ──────────────────────────────────────────────────

/**
 * Stable human-readable key for a descriptor. Used as the RunReport key,
 * the log prefix and the dashboard session name suffix.
 */
export function describeCapability(descriptor: CapabilityDescriptor): string {
  if (descriptor.name !== undefined) return descriptor.name;

  const browser = descriptor.browserVersion !== undefined
    ? `${descriptor.browser} ${descriptor.browserVersion}`
    : descriptor.browser;

  if (descriptor.device !== undefined) {
    return `${descriptor.device}/${browser}`;
  }

  const platform = [descriptor.os, descriptor.osVersion]
    .filter((part): part is string => part !== undefined)
    .join(' ');

  return platform.length > 0 ? `${platform}/${browser}` : browser;
}

export const LOCAL_DESCRIPTOR: CapabilityDescriptor = Object.freeze({
  name: 'local/chromium',
  browser: 'chrome',
});
