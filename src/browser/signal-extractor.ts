export interface PageSnapshot {
  httpStatus?: number
  finalUrl: string
  title: string
  text: string
}

const TRUNCATION_MARKER = '...'

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Condense what the tab showed into the text the classifier reads.
 * The result never exceeds `maxLength` characters.
 */
export function extractSignal(snapshot: PageSnapshot, maxLength: number): string {
  const title = collapseWhitespace(snapshot.title)
  const text = collapseWhitespace(snapshot.text)

  const signal = [
    `HTTP status: ${snapshot.httpStatus ?? 'none'}`,
    `Final URL: ${snapshot.finalUrl}`,
    `Title: ${title || '(none)'}`,
    `Visible text: ${text || '(none)'}`,
  ].join('\n')

  if (signal.length <= maxLength) {
    return signal
  }

  if (maxLength <= TRUNCATION_MARKER.length) {
    return signal.slice(0, maxLength)
  }

  return signal.slice(0, maxLength - TRUNCATION_MARKER.length) + TRUNCATION_MARKER
}
