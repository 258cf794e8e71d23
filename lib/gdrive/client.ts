import { google, type drive_v3 } from 'googleapis'
import { JWT, OAuth2Client } from 'google-auth-library'
import { Readable } from 'stream'
import fs from 'fs'
import path from 'path'
import { z } from 'zod'

import { StorageUnavailableError } from '@/lib/pipeline/errors'
import type { RemoteStorage } from '@/lib/pipeline/stages/types'

const SCOPES = ['https://www.googleapis.com/auth/drive.file']
const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder'
const FINGERPRINT_PROPERTY = 'fingerprint'

const ServiceAccountKeySchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
})
type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>

export type DriveCredentials =
  | { type: 'oauth'; clientId: string; clientSecret: string; refreshToken: string }
  | { type: 'service_account'; key: string }

/** Service account key given inline as JSON or as a path to a JSON file. */
export function loadServiceAccountKey(raw: string): ServiceAccountKey {
  const trimmed = raw.trim()
  if (trimmed.startsWith('{')) {
    return ServiceAccountKeySchema.parse(JSON.parse(trimmed))
  }

  const candidatePaths = [trimmed, path.resolve(process.cwd(), trimmed)]
  for (const p of candidatePaths) {
    if (fs.existsSync(p)) {
      return ServiceAccountKeySchema.parse(JSON.parse(fs.readFileSync(p, 'utf-8')))
    }
  }

  throw new Error('GOOGLE_SERVICE_ACCOUNT_KEY must be JSON or a path to a JSON file')
}

function createAuth(credentials: DriveCredentials): OAuth2Client | JWT {
  if (credentials.type === 'oauth') {
    const client = new OAuth2Client({ clientId: credentials.clientId, clientSecret: credentials.clientSecret })
    // access tokens are refreshed from the refresh token on demand
    client.setCredentials({ refresh_token: credentials.refreshToken })
    return client
  }

  const key = loadServiceAccountKey(credentials.key)
  return new JWT({ email: key.client_email, key: key.private_key, scopes: SCOPES })
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`
}

async function driveCall<T>(what: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call()
  } catch (error) {
    throw new StorageUnavailableError(`Google Drive ${what} failed: ${error instanceof Error ? error.message : String(error)}`, error)
  }
}

/**
 * Google Drive as the publish target. Every uploaded file carries its
 * content fingerprint in `appProperties`, which is what `listExisting`
 * reports back for de-duplication.
 */
export class DriveStorage implements RemoteStorage {
  private readonly folderIds = new Map<string, string>()

  constructor(private readonly drive: drive_v3.Drive) {}

  static fromCredentials(credentials: DriveCredentials): DriveStorage {
    return new DriveStorage(google.drive({ version: 'v3', auth: createAuth(credentials) }))
  }

  async ensureFolder(folderPath: string): Promise<string> {
    const names = folderPath.split('/').map(name => name.trim()).filter(Boolean)
    let parentId = 'root'
    let walked = ''

    for (const name of names) {
      walked = walked ? `${walked}/${name}` : name
      const cached = this.folderIds.get(walked)
      if (cached) {
        parentId = cached
        continue
      }
      parentId = await this.findOrCreateFolder(name, parentId)
      this.folderIds.set(walked, parentId)
    }
    return parentId
  }

  async upload(folderId: string, filename: string, content: Uint8Array, fingerprint: string): Promise<string> {
    const response = await driveCall(`upload of ${filename}`, () =>
      this.drive.files.create({
        requestBody: {
          name: filename,
          parents: [folderId],
          appProperties: { [FINGERPRINT_PROPERTY]: fingerprint },
        },
        media: { body: Readable.from(Buffer.from(content)) },
        fields: 'id',
      }),
    )
    const id = response.data.id
    if (!id) throw new StorageUnavailableError(`Google Drive returned no id for ${filename}`)
    return id
  }

  async listExisting(folderId: string): Promise<ReadonlyMap<string, string>> {
    const existing = new Map<string, string>()
    let pageToken: string | undefined

    do {
      const response = await driveCall('listing', () =>
        this.drive.files.list({
          q: `${quote(folderId)} in parents and trashed = false`,
          fields: 'nextPageToken, files(id, appProperties)',
          pageSize: 1000,
          pageToken,
        }),
      )
      for (const file of response.data.files ?? []) {
        const fingerprint = file.appProperties?.[FINGERPRINT_PROPERTY]
        if (file.id && fingerprint) existing.set(fingerprint, file.id)
      }
      pageToken = response.data.nextPageToken ?? undefined
    } while (pageToken)

    return existing
  }

  private async findOrCreateFolder(name: string, parentId: string): Promise<string> {
    const found = await driveCall(`folder lookup of ${name}`, () =>
      this.drive.files.list({
        q: `name = ${quote(name)} and mimeType = '${FOLDER_MIME_TYPE}' and ${quote(parentId)} in parents and trashed = false`,
        fields: 'files(id, name)',
        spaces: 'drive',
      }),
    )
    const existingId = found.data.files?.[0]?.id
    if (existingId) return existingId

    const created = await driveCall(`folder creation of ${name}`, () =>
      this.drive.files.create({
        requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
        fields: 'id',
      }),
    )
    if (!created.data.id) throw new StorageUnavailableError(`Google Drive returned no id for folder ${name}`)
    console.log(`[DRIVE] Created folder ${name} (${created.data.id})`)
    return created.data.id
  }
}
