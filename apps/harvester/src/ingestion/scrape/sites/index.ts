import type { SourceManifest } from '../types.js'
import { manifest as bakuelectronics } from './bakuelectronics/manifest.js'
import { manifest as birmarket } from './birmarket/manifest.js'
import { manifest as bytelecom } from './bytelecom/manifest.js'
import { manifest as irshad } from './irshad/manifest.js'
import { manifest as kontakt } from './kontakt/manifest.js'
import { manifest as mgstore } from './mgstore/manifest.js'
import { manifest as smartelectronics } from './smartelectronics/manifest.js'
import { manifest as soliton } from './soliton/manifest.js'
import { manifest as tapaz } from './tapaz/manifest.js'
import { manifest as texnohome } from './texnohome/manifest.js'
import { manifest as wtaz } from './wtaz/manifest.js'

export const SITE_MANIFESTS: SourceManifest[] = [
  bakuelectronics,
  birmarket,
  bytelecom,
  irshad,
  kontakt,
  mgstore,
  smartelectronics,
  soliton,
  tapaz,
  texnohome,
  wtaz,
]
