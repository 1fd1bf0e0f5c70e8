export interface StoredObject {
  key: string
  body: Buffer
  contentType: string
  signal?: AbortSignal
}

export interface PresignOptions {
  expiresInSeconds: number
  /** Download name offered to the browser. */
  filename: string
}

/** A private bucket that can hand out short-lived read links to single objects. */
export abstract class ObjectStorage {
  abstract put(object: StoredObject): Promise<void>
  abstract presignGet(key: string, options: PresignOptions): Promise<string>
  abstract delete(key: string): Promise<void>
}
