/**
 * Lines of `current` not yet in `previous`, for a capped log trail that drops
 * its oldest lines as new ones arrive. The trail is matched by its longest
 * overlap: the end of `previous` against the start of `current`.
 */
export function unsentLines(previous: readonly string[], current: readonly string[]): string[] {
  for (let overlap = Math.min(previous.length, current.length); overlap > 0; overlap--) {
    const tail = previous.slice(previous.length - overlap)
    if (tail.every((line, index) => line === current[index])) {
      return current.slice(overlap)
    }
  }
  return [...current]
}
