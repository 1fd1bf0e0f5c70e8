import { normalizeForMatch, scoreSimilarity, soundex } from './similarity-tiers'

describe('scoreSimilarity', () => {
  test('ranks exact, prefix, normalized, phonetic and unrelated matches in order', () => {
    const value = 'Acme Corp'
    expect(scoreSimilarity(value, 'Acme Corp')).toBe(100)
    expect(scoreSimilarity(value, 'acme corp')).toBe(100)
    expect(scoreSimilarity(value, 'Acme')).toBe(90)
    expect(scoreSimilarity(value, 'AcmeCorp')).toBe(75)
    expect(scoreSimilarity(value, 'Akme Korp')).toBe(70)
    expect(scoreSimilarity(value, 'Globex')).toBe(0)
  })

  test('scores containment by how early the term appears', () => {
    expect(scoreSimilarity('XAcme', 'Acme')).toBe(85)
    expect(scoreSimilarity('XYAcme', 'Acme')).toBe(83)
    expect(scoreSimilarity('The Acme Corp', 'Acme')).toBe(80)
    expect(scoreSimilarity('Northwind Consolidated Acme', 'Acme')).toBe(80)
  })

  test('matches vendor names that differ only by spacing and legal suffix', () => {
    expect(scoreSimilarity('GlobalTech Inc.', 'Global Tech')).toBe(75)
    expect(scoreSimilarity('Initech LLC', 'Global Tech')).toBe(0)
  })

  test('falls back to containment of normalized forms', () => {
    expect(scoreSimilarity('Acme Widgets Holdings', 'widgets-holdings')).toBe(65)
  })

  test('scores missing values as zero', () => {
    expect(scoreSimilarity(null, 'Acme')).toBe(0)
    expect(scoreSimilarity(undefined, 'Acme')).toBe(0)
  })
})

describe('normalizeForMatch', () => {
  test('keeps ASCII letters and digits and drops one trailing legal suffix', () => {
    expect(normalizeForMatch('GlobalTech Inc.')).toBe('GLOBALTECH')
    expect(normalizeForMatch('Acme Corporation')).toBe('ACME')
    expect(normalizeForMatch('Müller GmbH')).toBe('MLLER')
    expect(normalizeForMatch('Inc.')).toBe('')
  })
})

describe('soundex', () => {
  test('encodes names the way fuzzystrmatch does', () => {
    expect(soundex('Robert')).toBe('R163')
    expect(soundex('Rupert')).toBe('R163')
    expect(soundex('Tymczak')).toBe('T522')
    expect(soundex('Pfister')).toBe('P236')
    expect(soundex('Lee')).toBe('L000')
    expect(soundex('Acme Corp')).toBe('A252')
    expect(soundex('Akme Korp')).toBe('A252')
  })

  test('returns an empty code when there are no letters', () => {
    expect(soundex('')).toBe('')
    expect(soundex('12-34')).toBe('')
  })
})
