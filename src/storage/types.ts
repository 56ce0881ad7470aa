// src/storage/types.ts
// Remote object store contract (folders of media files).

/* ---------- Types ---------- */

export interface SourceObject {
  id: string;
  /** Display name as shown in the store. */
  name: string;
  /** Folder the object was listed from (first parent). */
  containerId: string;
  mimeType: string;
  /** ISO-8601 creation time. */
  createdTime: string;
  sizeBytes: number | null;
  webViewLink: string | null;
  /** Store-side key/value annotations. */
  properties: Record<string, string>;
}

export interface FolderRef {
  id: string;
  name: string;
}

export interface ObjectAnnotation {
  description?: string;
  /** Merged into existing properties; an empty string clears a key. */
  properties?: Record<string, string>;
}

/* ---------- ObjectStore ---------- */

export interface ObjectStore {
  /** Direct sub-folders of `parentId`. */
  listFolders(parentId: string): Promise<FolderRef[]>;

  /**
   * Audio and video objects in a folder, oldest first, trashed objects excluded.
   */
  listMediaObjects(containerId: string): Promise<SourceObject[]>;

  /** Every non-folder object in a folder, oldest first. */
  listObjects(containerId: string): Promise<SourceObject[]>;

  getObject(objectId: string): Promise<SourceObject>;

  /** Bytes [start, end] inclusive. */
  readRange(objectId: string, start: number, end: number): Promise<Uint8Array>;

  annotate(objectId: string, annotation: ObjectAnnotation): Promise<void>;

  /** Replace every parent of the object with `targetContainerId`. */
  moveObject(objectId: string, targetContainerId: string): Promise<void>;
}

export function isMediaMimeType(mimeType: string): boolean {
  return mimeType.startsWith('audio/') || mimeType.startsWith('video/');
}
