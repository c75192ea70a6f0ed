const COLUMN_FALLBACK_PREFIX = 'column_'

/**
 * Lower-cases a header and collapses anything that is not a letter, digit or
 * underscore into single underscores. Returns '' when nothing is left.
 */
export function normalizeIdentifier(rawName: string | undefined): string {
  let base = (rawName ?? '').trim().toLowerCase().replace(/[^a-z0-9_]/g, '_')
  base = base.replace(/_+/g, '_').replace(/^_+|_+$/g, '')
  return base
}

/**
 * Produces a unique column key for a header, falling back to `column_<n>` for
 * blank headers and suffixing `_2`, `_3`, ... on repeats.
 */
export function generateColumnIdentifier(
  rawName: string | undefined,
  index: number,
  usedNames: Set<string>,
  baseNameCounts: Map<string, number>
): string {
  const fallback = `${COLUMN_FALLBACK_PREFIX}${index + 1}`
  const base = normalizeIdentifier(rawName) || fallback

  if (!usedNames.has(base)) {
    usedNames.add(base)
    baseNameCounts.set(base, 1)
    return base
  }

  let counter = (baseNameCounts.get(base) ?? 1) + 1
  let candidate = `${base}_${counter}`
  while (usedNames.has(candidate)) {
    counter += 1
    candidate = `${base}_${counter}`
  }

  baseNameCounts.set(base, counter)
  usedNames.add(candidate)
  return candidate
}
