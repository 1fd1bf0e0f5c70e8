export const SIMILARITY_GUIDANCE = [
  "Fuzzy matching: SIMILARITY(column, 'term') can be used anywhere an expression is allowed and returns a score:",
  '100 exact match ignoring case; 90 the value starts with the term; 80-85 the value contains the term;',
  '75 equal once spacing, punctuation and a legal suffix (Inc, LLC, Ltd, Corp, GmbH...) are removed;',
  '70 sounds alike; 65 contains the term after that normalization; 0 otherwise.',
  "Filter with a threshold such as SIMILARITY(vendor_name, 'Acme') >= 70 and ORDER BY the score descending",
  'when names, vendors or references may be misspelled. The first argument must be a column and the second a',
  'single quoted string.',
].join(' ')

export function withSchema(intro: string, schemaDescription: string) {
  return `${intro}\n\n${SIMILARITY_GUIDANCE}\n\nDatabase schema (PostgreSQL):\n${schemaDescription}`
}
