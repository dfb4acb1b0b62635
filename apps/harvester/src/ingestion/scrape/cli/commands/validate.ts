import { validateManifest } from '../../kit/validate.js'
import { assertRegistryParity, createSourceRegistry } from '../../registry.js'
import { SITE_MANIFESTS } from '../../sites/index.js'

interface ValidateCommandArgs {
  sourceId?: string
}

/**
 * Validate the built-in manifests without registering them first, so every
 * problem is reported instead of the first thrown one.
 */
export async function runValidateCommand(args: ValidateCommandArgs): Promise<number> {
  const manifests = args.sourceId ? SITE_MANIFESTS.filter(manifest => manifest.id === args.sourceId) : SITE_MANIFESTS
  if (manifests.length === 0) {
    console.error(`Unknown source: ${args.sourceId ?? ''}`)
    return 2
  }

  let failures = 0
  for (const manifest of manifests) {
    const result = validateManifest(manifest)
    if (result.ok) {
      console.log(`  ${manifest.id}: ok`)
      continue
    }
    failures++
    console.error(`  ${manifest.id}: invalid`)
    for (const error of result.errors) {
      console.error(`    - ${error}`)
    }
  }

  if (failures > 0) {
    return 1
  }

  if (!args.sourceId) {
    const parity = assertRegistryParity(createSourceRegistry(SITE_MANIFESTS))
    if (!parity.ok) {
      console.error(`Registry mismatch: missing [${parity.missingInRegistry.join(', ')}], unknown [${parity.unknownSourceIds.join(', ')}]`)
      return 1
    }
  }

  return 0
}
