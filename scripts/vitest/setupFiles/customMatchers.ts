import { expect } from 'vitest'

const toHex = (bytes: Uint8Array): string =>
  Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('')

expect.extend({
  toEqualBytes(received: unknown, expected: Uint8Array) {
    if (!(received instanceof Uint8Array)) {
      return {
        pass: false,
        message: () => 'Received value is not a Uint8Array',
      }
    }

    const actualHex = toHex(received)
    const expectedHex = toHex(expected)
    if (actualHex === expectedHex) {
      return {
        message: () => `Received bytes equal 0x${expectedHex}`,
        pass: true,
      }
    }

    return {
      pass: false,
      message: () => `Expected bytes 0x${expectedHex}, received 0x${actualHex}`,
      actual: `0x${actualHex}`,
      expected: `0x${expectedHex}`,
    }
  },
})

interface BytesMatchers<R = unknown> {
  toEqualBytes(expected: Uint8Array): R
}

declare module 'vitest' {
  interface Assertion<T = any> extends BytesMatchers<T> {}
  interface AsymmetricMatchersContaining extends BytesMatchers {}
}
