export const bytesToHex = (bytes: Uint8Array): `0x${string}` =>
  `0x${Array.from(bytes, x => x.toString(16).padStart(2, '0')).join('')}`

export const concatBytes = (parts: readonly Uint8Array[]): Uint8Array => {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let at = 0
  for (const p of parts) {
    out.set(p, at)
    at += p.length
  }
  return out
}

const utf8 = new TextEncoder()
const utf8Decoder = new TextDecoder()

export const utf8Bytes = (s: string): Uint8Array => utf8.encode(s)
export const utf8String = (b: Uint8Array): string => utf8Decoder.decode(b)
