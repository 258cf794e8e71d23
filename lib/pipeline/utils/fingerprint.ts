import { createHash } from 'crypto'

/** Content fingerprint used for freshness checks and upload de-duplication. */
export function fingerprint(content: Uint8Array | string): string {
  return `sha256:${createHash('sha256').update(content).digest('hex')}`
}
