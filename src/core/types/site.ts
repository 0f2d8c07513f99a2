import { z } from 'zod'

// SiteSpec is a single site to check, as defined by the catalog
export const SiteSpecSchema = z.object({
  name: z.string().min(1, 'Site name is required'),
  url: z.string().url('Must be a valid URL'),
})

export type SiteSpec = Readonly<z.infer<typeof SiteSpecSchema>>

// A category lists its sites either as [{ name, url }] or as { name: url }
export const CategorySitesSchema = z.union([
  z.array(SiteSpecSchema),
  z.record(z.string().min(1, 'Site name is required'), z.string().url('Must be a valid URL')),
])

export const CatalogFileSchema = z.record(z.string().min(1, 'Category name is required'), CategorySitesSchema)

export type CatalogFile = z.infer<typeof CatalogFileSchema>

/**
 * Category name -> ordered sites. Iteration order is the order categories
 * were declared in.
 */
export type Catalog = ReadonlyMap<string, readonly SiteSpec[]>
