import psl from 'psl'
import { validateManifest } from './kit/validate.js'
import { SITE_MANIFESTS } from './sites/index.js'
import { SOURCE_IDS } from './types.js'
import type { SourceId, SourceManifest } from './types.js'

export interface SourceRegistry {
  register(manifest: SourceManifest): void
  ids(): SourceId[]
  get(id: SourceId): SourceManifest | undefined
  /** Manifests in registration order */
  manifests(): SourceManifest[]
}

function registrableDomainForBaseUrl(baseUrl: string): string {
  let host: string
  try {
    host = new URL(baseUrl).hostname.toLowerCase()
  } catch {
    return baseUrl.toLowerCase()
  }

  const registrable = psl.get(host)
  return (registrable ?? host).toLowerCase()
}

/**
 * Registry that validates each manifest and refuses two sources claiming
 * the same registrable domain.
 */
export function createSourceRegistry(initial: readonly SourceManifest[] = []): SourceRegistry {
  const registrations = new Map<SourceId, SourceManifest>()
  const domainOwners = new Map<string, SourceId>()

  const register = (manifest: SourceManifest): void => {
    const validation = validateManifest(manifest)
    if (!validation.ok) {
      throw new Error(`Source '${manifest.id}' manifest is invalid: ${validation.errors.join('; ')}`)
    }

    if (registrations.has(manifest.id)) {
      throw new Error(`Source '${manifest.id}' is already registered`)
    }

    const domains = manifest.baseUrls.map(registrableDomainForBaseUrl)
    for (const registrableDomain of domains) {
      const existingOwner = domainOwners.get(registrableDomain)
      if (existingOwner && existingOwner !== manifest.id) {
        throw new Error(`Source '${manifest.id}' collides with '${existingOwner}' on registrable domain '${registrableDomain}'`)
      }
    }

    for (const registrableDomain of domains) {
      domainOwners.set(registrableDomain, manifest.id)
    }
    registrations.set(manifest.id, manifest)
  }

  for (const manifest of initial) {
    register(manifest)
  }

  return {
    register,
    ids: () => [...registrations.keys()],
    get: id => registrations.get(id),
    manifests: () => [...registrations.values()],
  }
}

let defaultRegistry: SourceRegistry | undefined

/** Registry of the built-in sources, validated on first use */
export function getSourceRegistry(): SourceRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createSourceRegistry(SITE_MANIFESTS)
  }
  return defaultRegistry
}

export function assertRegistryParity(registry: SourceRegistry, expectedIds: readonly string[] = SOURCE_IDS): {
  ok: boolean
  missingInRegistry: string[]
  unknownSourceIds: string[]
} {
  const knownIds = new Set(expectedIds)
  const registeredIds = new Set<string>(registry.ids())

  const missingInRegistry = [...knownIds]
    .filter(id => !registeredIds.has(id))
    .sort((a, b) => a.localeCompare(b))

  const unknownSourceIds = [...registeredIds]
    .filter(id => !knownIds.has(id))
    .sort((a, b) => a.localeCompare(b))

  return {
    ok: missingInRegistry.length === 0 && unknownSourceIds.length === 0,
    missingInRegistry,
    unknownSourceIds,
  }
}
