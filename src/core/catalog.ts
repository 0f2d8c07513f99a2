import { readFile } from 'fs/promises'
import * as path from 'path'
import { Catalog, CatalogFileSchema, SiteSpec } from './types'
import { formatIssues } from './utils/format-issues'

export class CatalogError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CatalogError'
  }
}

/**
 * Location of the bundled site list, used when no catalog is configured
 */
export function defaultCatalogPath(): string {
  // Production build lives under dist/src/core, sources under src/core
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    return path.join(__dirname, '../../../catalog/default-sites.json')
  }
  return path.join(__dirname, '../../catalog/default-sites.json')
}

/**
 * Validate raw catalog data and normalize it into an immutable Catalog.
 * Accepts `{ category: [{ name, url }] }` and `{ category: { name: url } }`.
 */
export function createCatalog(raw: unknown): Catalog {
  const parsed = CatalogFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new CatalogError(`Invalid catalog:\n${formatIssues(parsed.error.issues)}`)
  }

  const catalog = new Map<string, readonly SiteSpec[]>()

  for (const [category, entries] of Object.entries(parsed.data)) {
    const sites: SiteSpec[] = Array.isArray(entries)
      ? entries.map((site) => Object.freeze({ name: site.name, url: site.url }))
      : Object.entries(entries).map(([name, url]) => Object.freeze({ name, url }))

    assertUniqueSiteNames(category, sites)
    catalog.set(category, Object.freeze(sites))
  }

  return catalog
}

/**
 * Read and validate a catalog JSON file
 */
export async function loadCatalog(filePath: string = defaultCatalogPath()): Promise<Catalog> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new CatalogError(
      `Failed to read catalog ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new CatalogError(
      `Catalog ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  return createCatalog(raw)
}

/**
 * Keep only the named categories, in catalog order
 */
export function filterCatalog(catalog: Catalog, categories: string[]): Catalog {
  const unknown = categories.filter((category) => !catalog.has(category))
  if (unknown.length > 0) {
    throw new CatalogError(`Unknown categor${unknown.length === 1 ? 'y' : 'ies'}: ${unknown.join(', ')}`)
  }

  const wanted = new Set(categories)
  return new Map(Array.from(catalog.entries()).filter(([category]) => wanted.has(category)))
}

export function countSites(catalog: Catalog): number {
  let total = 0
  catalog.forEach((sites) => {
    total += sites.length
  })
  return total
}

/**
 * A run needs at least one category and at least one site, and results are
 * keyed by site name, so names must be unique within a category
 */
export function assertRunnableCatalog(catalog: Catalog): void {
  if (catalog.size === 0) {
    throw new CatalogError('Catalog is empty: no categories to check')
  }
  if (countSites(catalog) === 0) {
    throw new CatalogError('Catalog is empty: no sites to check')
  }
  catalog.forEach((sites, category) => assertUniqueSiteNames(category, sites))
}

function assertUniqueSiteNames(category: string, sites: readonly SiteSpec[]): void {
  const seen = new Set<string>()
  for (const site of sites) {
    if (seen.has(site.name)) {
      throw new CatalogError(`Duplicate site name "${site.name}" in category "${category}"`)
    }
    seen.add(site.name)
  }
}
