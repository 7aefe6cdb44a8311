import { afterEach } from 'vitest'

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for collector tests')
}

const blockedFetch: typeof fetch = async () => blockedNetwork()

globalThis.fetch = blockedFetch

afterEach(() => {
  globalThis.fetch = blockedFetch
})
