import http from 'node:http'
import https from 'node:https'
import net from 'node:net'
import tls from 'node:tls'

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for harvester tests')
}

const patched: Array<[object, string]> = [
  [http, 'request'],
  [http, 'get'],
  [https, 'request'],
  [https, 'get'],
  [net, 'connect'],
  [tls, 'connect'],
]

const originals = patched.map(([target, key]) => Object.getOwnPropertyDescriptor(target, key))

for (const [target, key] of patched) {
  Object.defineProperty(target, key, { value: blockedNetwork, configurable: true, writable: true })
}

const originalFetch = globalThis.fetch
globalThis.fetch = async () => blockedNetwork()

process.on('exit', () => {
  patched.forEach(([target, key], index) => {
    const descriptor = originals[index]
    if (descriptor) {
      Object.defineProperty(target, key, descriptor)
    }
  })
  globalThis.fetch = originalFetch
})
