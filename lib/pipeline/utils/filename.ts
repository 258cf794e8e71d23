import path from 'path'

const AUDIO_EXTENSIONS: ReadonlyArray<string> = ['.mp3', '.ogg', '.m4a', '.wav', '.flac']

export function hasAudioExtension(filename: string): boolean {
  return AUDIO_EXTENSIONS.includes(path.extname(filename).toLowerCase())
}

/**
 * Safe character set for stored filenames: letters, numbers, dot, dash,
 * underscore and space. Anything else (path separators included) is dropped.
 */
const UNSAFE_FILENAME_CHARS = /[^a-zA-Z0-9._\-\s]/g

export function sanitizeFilename(originalName: string | undefined, fallback = 'recording'): string {
  if (!originalName) return fallback
  const base = path.basename(originalName.replace(/\0/g, '').replace(/\\/g, '/'))
  const safe = base
    .replace(UNSAFE_FILENAME_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '')
  return safe.length > 0 ? safe : fallback
}

/** Sanitized audio filename; `.mp3` is appended when there is no audio extension. */
export function audioFilename(rawName: string | undefined, id: string): string {
  const safe = sanitizeFilename(rawName, sanitizeFilename(id))
  return hasAudioExtension(safe) ? safe : `${safe}.mp3`
}

/** Filename without its extension, used to name derived artifacts. */
export function baseName(filename: string): string {
  const ext = path.extname(filename)
  return ext ? filename.slice(0, -ext.length) : filename
}

/** Recording ids name per-recording directories, so they must be a single plain path segment. */
const RECORDING_ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

export function isSafeRecordingId(id: string): boolean {
  return RECORDING_ID_RE.test(id)
}

export function assertSafeRecordingId(id: string): void {
  if (!isSafeRecordingId(id)) {
    throw new Error(`Recording id ${JSON.stringify(id)} cannot be used as a path segment`)
  }
}
