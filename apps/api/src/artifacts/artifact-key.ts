import { randomBytes } from 'node:crypto'

const DEFAULT_SLUG = 'query_result'

export function slugifyFilename(name: string | undefined) {
  const slug = (name ?? '')
    .replace(/\.(csv|pdf)$/i, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 60)
  return slug || DEFAULT_SLUG
}

function timestamp(date: Date) {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
    + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
}

/** `<prefix>/<yyyyMMdd_HHmmss>_<8 hex>_<filename>`, unique per issue. */
export function buildArtifactKey(prefix: string, issuedAt: Date, filename: string, nonce = randomBytes(4).toString('hex')) {
  const folder = prefix.replace(/^\/+|\/+$/g, '')
  const name = `${timestamp(issuedAt)}_${nonce}_${filename}`
  return folder ? `${folder}/${name}` : name
}
