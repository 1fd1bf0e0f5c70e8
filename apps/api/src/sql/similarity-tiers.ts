/** Scores of the composite similarity expression, highest tier first. */
export const SIMILARITY_SCORES = {
  exact: 100,
  prefix: 90,
  containmentMax: 85,
  containmentMin: 80,
  containmentStep: 2,
  normalized: 75,
  phonetic: 70,
  normalizedContainment: 65,
  none: 0,
} as const

export const LEGAL_ENTITY_SUFFIXES = [
  'INCORPORATED',
  'CORPORATION',
  'LIMITED',
  'INC',
  'LLC',
  'LTD',
  'CORP',
  'GMBH',
  'PLC',
] as const

/** Both patterns are read by JavaScript and PostgreSQL regular expressions alike. */
export const NON_ALPHANUMERIC_PATTERN = '[^A-Z0-9]+'
export const LEGAL_SUFFIX_PATTERN = `(${LEGAL_ENTITY_SUFFIXES.join('|')})$`

/**
 * The operations the tiers are written against. One implementation renders PostgreSQL,
 * the other evaluates values in process, so both follow the same tier table.
 * Upper-casing touches ASCII letters only (PostgreSQL under the "C" collation).
 */
export interface TierDialect<Text, Num, Bool> {
  number(value: number): Num
  upper(text: Text): Text
  stripPattern(text: Text, pattern: string): Text
  soundex(text: Text): Text
  /** 1-based offset of `needle` in `haystack`, 0 when absent. */
  position(haystack: Text, needle: Text): Num
  equals(left: Text, right: Text): Bool
  numberEquals(left: Num, right: number): Bool
  greaterThan(left: Num, right: number): Bool
  /** `max(floor, start - (value - origin) * step)` */
  decay(value: Num, curve: { floor: number; start: number; origin: number; step: number }): Num
}

export interface SimilarityTier {
  name: string
  /** Whether the tier can match at all for this (already trimmed) term. */
  applies(term: string): boolean
  build<Text, Num, Bool>(dialect: TierDialect<Text, Num, Bool>, value: Text, term: Text): { when: Bool; then: Num }
}

export function normalizeWith<Text, Num, Bool>(dialect: TierDialect<Text, Num, Bool>, text: Text) {
  const alphanumeric = dialect.stripPattern(dialect.upper(text), NON_ALPHANUMERIC_PATTERN)
  return dialect.stripPattern(alphanumeric, LEGAL_SUFFIX_PATTERN)
}

// A..Z, same table as PostgreSQL's fuzzystrmatch
const SOUNDEX_TABLE = '01230120022455012623010202'
const SOUNDEX_LENGTH = 4

function soundexCode(ch: string) {
  const upper = ch.toUpperCase()
  const index = upper.charCodeAt(0) - 65
  if (upper.length !== 1 || index < 0 || index > 25) return ch
  return SOUNDEX_TABLE[index]
}

function isAsciiLetter(ch: string) {
  return /^[A-Za-z]$/.test(ch)
}

/** Four-character Soundex code, or '' when the text holds no ASCII letter. */
export function soundex(text: string) {
  let pos = 0
  while (pos < text.length && !isAsciiLetter(text[pos])) pos += 1
  if (pos >= text.length) return ''

  let code = text[pos].toUpperCase()
  pos += 1
  while (pos < text.length && code.length < SOUNDEX_LENGTH) {
    const ch = text[pos]
    if (isAsciiLetter(ch) && soundexCode(ch) !== soundexCode(text[pos - 1])) {
      const digit = soundexCode(ch)
      if (digit !== '0') code += digit
    }
    pos += 1
  }
  return code.padEnd(SOUNDEX_LENGTH, '0')
}

export const valueDialect: TierDialect<string, number, boolean> = {
  number: (value) => value,
  upper: (text) => text.replace(/[a-z]+/g, (run) => run.toUpperCase()),
  stripPattern: (text, pattern) => text.replace(new RegExp(pattern, 'g'), ''),
  soundex,
  position: (haystack, needle) => haystack.indexOf(needle) + 1,
  equals: (left, right) => left === right,
  numberEquals: (left, right) => left === right,
  greaterThan: (left, right) => left > right,
  decay: (value, { floor, start, origin, step }) => Math.max(floor, start - (value - origin) * step),
}

/** Upper-cases, strips everything but ASCII letters and digits, then drops one trailing legal-entity suffix. */
export function normalizeForMatch(text: string) {
  return normalizeWith(valueDialect, text)
}

const CONTAINMENT_CURVE = {
  floor: SIMILARITY_SCORES.containmentMin,
  start: SIMILARITY_SCORES.containmentMax,
  origin: 2,
  step: SIMILARITY_SCORES.containmentStep,
}

const hasNormalizedForm = (term: string) => normalizeForMatch(term) !== ''
const hasPhoneticCode = (term: string) => soundex(term) !== ''

/** First matching tier wins. */
export const SIMILARITY_TIERS: readonly SimilarityTier[] = [
  {
    name: 'exact',
    applies: () => true,
    build: (d, value, term) => ({
      when: d.equals(d.upper(value), d.upper(term)),
      then: d.number(SIMILARITY_SCORES.exact),
    }),
  },
  {
    name: 'prefix',
    applies: () => true,
    build: (d, value, term) => ({
      when: d.numberEquals(d.position(d.upper(value), d.upper(term)), 1),
      then: d.number(SIMILARITY_SCORES.prefix),
    }),
  },
  {
    name: 'containment',
    applies: () => true,
    build: (d, value, term) => {
      const position = d.position(d.upper(value), d.upper(term))
      return { when: d.greaterThan(position, 1), then: d.decay(position, CONTAINMENT_CURVE) }
    },
  },
  {
    name: 'normalized',
    applies: hasNormalizedForm,
    build: (d, value, term) => ({
      when: d.equals(normalizeWith(d, value), normalizeWith(d, term)),
      then: d.number(SIMILARITY_SCORES.normalized),
    }),
  },
  {
    name: 'phonetic',
    applies: hasPhoneticCode,
    build: (d, value, term) => ({
      when: d.equals(d.soundex(value), d.soundex(term)),
      then: d.number(SIMILARITY_SCORES.phonetic),
    }),
  },
  {
    name: 'normalized containment',
    applies: hasNormalizedForm,
    build: (d, value, term) => ({
      when: d.greaterThan(d.position(normalizeWith(d, value), normalizeWith(d, term)), 0),
      then: d.number(SIMILARITY_SCORES.normalizedContainment),
    }),
  },
]

/** In-process counterpart of the SQL expression produced for `SIMILARITY(value, term)`. */
export function scoreSimilarity(value: string | null | undefined, term: string) {
  if (value == null) return SIMILARITY_SCORES.none
  for (const tier of SIMILARITY_TIERS) {
    if (!tier.applies(term)) continue
    const { when, then } = tier.build(valueDialect, value, term)
    if (when) return then
  }
  return SIMILARITY_SCORES.none
}
