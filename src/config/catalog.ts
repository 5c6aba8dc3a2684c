import { z } from 'zod';
import { CatalogPricingTable } from '../domain/pricing.js';
import { SizeAdvisor, type SizeLadder } from '../domain/sizeAdvisor.js';
import type { Logger } from '../logger.js';
import { readStructuredFile, parseWithSchema } from './loader.js';

const price = z.number().finite().min(0);

export const CatalogSchema = z
  .object({
    currency: z.literal('USD').default('USD'),
    hourlyPrices: z.record(z.string().min(1), price),
    regionalPrices: z.record(z.string().min(1), z.record(z.string().min(1), price)).default({}),
    sizeLadders: z.array(
      z.object({
        family: z.string().min(1),
        sizes: z.array(z.string().min(1)).min(1),
      }),
    ),
  })
  .superRefine((catalog, ctx) => {
    const owner = new Map<string, string>();
    catalog.sizeLadders.forEach((ladder, index) => {
      for (const size of ladder.sizes) {
        const existing = owner.get(size);
        if (existing !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['sizeLadders', index, 'sizes'],
            message: `${size} already belongs to ladder ${existing}`,
          });
          continue;
        }
        owner.set(size, ladder.family);
      }
    });
  });

export type Catalog = z.infer<typeof CatalogSchema>;

export interface CatalogModels {
  pricing: CatalogPricingTable;
  sizeAdvisor: SizeAdvisor;
}

export const loadCatalog = async (catalogPath: string, logger: Logger): Promise<Catalog> => {
  logger.debug('loadCatalog start', { catalogPath });
  const { absPath, parsed } = await readStructuredFile(catalogPath, 'Catalog', logger);
  const catalog = parseWithSchema(CatalogSchema, parsed, absPath);
  logger.debug('loadCatalog end', {
    prices: Object.keys(catalog.hourlyPrices).length,
    regions: Object.keys(catalog.regionalPrices).length,
    ladders: catalog.sizeLadders.length,
  });
  return catalog;
};

export const buildCatalogModels = (catalog: Catalog, underutilizationThreshold: number): CatalogModels => {
  const ladders: SizeLadder[] = catalog.sizeLadders.map((ladder) => ({ family: ladder.family, sizes: [...ladder.sizes] }));
  return {
    pricing: new CatalogPricingTable(catalog.hourlyPrices, catalog.regionalPrices),
    sizeAdvisor: new SizeAdvisor(ladders, underutilizationThreshold),
  };
};
