/**
 * Zod schemas for validating country configuration files
 */

import { z } from 'zod';

/**
 * Declared bounding box of a country
 */
export const BoundsSchema = z.object({
  min_lat: z.number().min(-90).max(90),
  max_lat: z.number().min(-90).max(90),
  min_lng: z.number().min(-180).max(180),
  max_lng: z.number().min(-180).max(180),
}).strict().refine(
  b => b.min_lat < b.max_lat && b.min_lng < b.max_lng,
  { message: 'min bounds must be strictly below max bounds' }
);

/**
 * Rectangle with optional open sides (a missing side is unbounded)
 */
export const RectSchema = z.object({
  min_lat: z.number().optional(),
  max_lat: z.number().optional(),
  min_lng: z.number().optional(),
  max_lng: z.number().optional(),
}).strict().refine(
  r => Object.values(r).some(v => v !== undefined),
  { message: 'rect needs at least one side' }
);

export const RegionSchema = z.union([
  z.object({ rect: RectSchema }).strict(),
  z.object({
    polygon: z.array(z.tuple([z.number(), z.number()])).min(3).describe('Vertices as [lat, lng]'),
  }).strict(),
]);

export type RawRegion = z.infer<typeof RegionSchema>;

export interface RawLandRule {
  name: string;
  region: RawRegion;
  verdict: 'land' | 'water';
  except?: RawLandRule[] | undefined;
}

/**
 * Ordered land/water rule; nested `except` rules are checked before the verdict
 */
export const LandRuleSchema: z.ZodType<RawLandRule> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    region: RegionSchema,
    verdict: z.enum(['land', 'water']),
    except: z.array(LandRuleSchema).optional(),
  }).strict()
);

/**
 * Schema for country configuration
 */
export const CountryConfigSchema = z.object({
  country: z.string().min(1).describe('Country identifier (lowercase, matches file name)'),
  display_name: z.string().min(1),
  bounds: BoundsSchema.describe('Bounding box that the grid covers'),
  land_bounds: BoundsSchema.optional().describe('Final land check when no rule matches'),
  rules: z.array(LandRuleSchema).default([]),
}).strict();

/**
 * Validate rule names are unique within a country
 */
export function validateRuleNames(config: CountryConfig): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();

  const visit = (rules: RawLandRule[], path: string) => {
    for (const rule of rules) {
      const qualified = path ? `${path}.${rule.name}` : rule.name;
      if (seen.has(qualified)) {
        errors.push(`Duplicate rule name '${qualified}'`);
      }
      seen.add(qualified);
      visit(rule.except ?? [], qualified);
    }
  };

  visit(config.rules, '');
  return errors;
}

/**
 * Comprehensive validation of country configuration
 */
export function validateCountryConfig(config: unknown): {
  success: boolean;
  data?: CountryConfig;
  errors: string[];
} {
  const parsed = CountryConfigSchema.safeParse(config);

  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
    };
  }

  const nameErrors = validateRuleNames(parsed.data);
  if (nameErrors.length > 0) {
    return { success: false, errors: nameErrors };
  }

  return { success: true, data: parsed.data, errors: [] };
}

export type CountryConfig = z.infer<typeof CountryConfigSchema>;
export type RawBounds = z.infer<typeof BoundsSchema>;
