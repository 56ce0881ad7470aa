// src/storage/googleDrive.ts
// ObjectStore backed by the Google Drive v3 API (googleapis).

import { google, type drive_v3 } from 'googleapis';
import { createLogger } from '../observability/logger.js';
import type { GoogleAuthClient } from './googleAuth.js';
import {
  isMediaMimeType,
  type FolderRef,
  type ObjectAnnotation,
  type ObjectStore,
  type SourceObject,
} from './types.js';

const log = createLogger('storage/googleDrive');

const FOLDER_MIME = 'application/vnd.google-apps.folder';
const FILE_FIELDS = 'id,name,mimeType,createdTime,size,parents,webViewLink,appProperties';
const PAGE_SIZE = 1000;

/** Quote a value for a Drive `q` expression. */
function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function toSourceObject(file: drive_v3.Schema$File, fallbackContainer: string): SourceObject | null {
  if (!file.id) return null;
  const size = file.size ? Number(file.size) : NaN;
  return {
    id: file.id,
    name: file.name ?? '',
    containerId: file.parents?.[0] ?? fallbackContainer,
    mimeType: file.mimeType ?? '',
    createdTime: file.createdTime ?? '',
    sizeBytes: Number.isFinite(size) ? size : null,
    webViewLink: file.webViewLink ?? null,
    properties: { ...(file.appProperties ?? {}) },
  };
}

export class GoogleDriveStore implements ObjectStore {
  private readonly drive: drive_v3.Drive;

  constructor(auth: GoogleAuthClient) {
    this.drive = google.drive({ version: 'v3', auth });
  }

  /* ---------- Listing ---------- */

  private async listAll(q: string, fields: string, orderBy?: string): Promise<drive_v3.Schema$File[]> {
    const files: drive_v3.Schema$File[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.drive.files.list({
        q,
        fields: `nextPageToken, files(${fields})`,
        orderBy,
        pageSize: PAGE_SIZE,
        pageToken,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      });
      files.push(...(res.data.files ?? []));
      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken);
    return files;
  }

  async listFolders(parentId: string): Promise<FolderRef[]> {
    const files = await this.listAll(
      `${quote(parentId)} in parents and mimeType = ${quote(FOLDER_MIME)} and trashed = false`,
      'id,name',
      'name'
    );
    const folders: FolderRef[] = [];
    for (const f of files) {
      if (f.id) folders.push({ id: f.id, name: f.name ?? '' });
    }
    return folders;
  }

  async listObjects(containerId: string): Promise<SourceObject[]> {
    const files = await this.listAll(
      `${quote(containerId)} in parents and mimeType != ${quote(FOLDER_MIME)} and trashed = false`,
      FILE_FIELDS,
      'createdTime'
    );
    const objects: SourceObject[] = [];
    for (const f of files) {
      const obj = toSourceObject(f, containerId);
      if (obj) objects.push(obj);
    }
    return objects;
  }

  async listMediaObjects(containerId: string): Promise<SourceObject[]> {
    const q =
      `${quote(containerId)} in parents and trashed = false and ` +
      `(mimeType contains 'audio/' or mimeType contains 'video/')`;
    const files = await this.listAll(q, FILE_FIELDS, 'createdTime');
    const objects: SourceObject[] = [];
    for (const f of files) {
      const obj = toSourceObject(f, containerId);
      // `contains` also matches e.g. application/x-audio/..., so re-check the prefix.
      if (obj && isMediaMimeType(obj.mimeType)) objects.push(obj);
    }
    return objects;
  }

  /* ---------- Single object ---------- */

  async getObject(objectId: string): Promise<SourceObject> {
    const res = await this.drive.files.get({
      fileId: objectId,
      fields: FILE_FIELDS,
      supportsAllDrives: true,
    });
    const obj = toSourceObject(res.data, '');
    if (!obj) {
      throw new Error(`Drive returned no metadata for ${objectId}`);
    }
    return obj;
  }

  async readRange(objectId: string, start: number, end: number): Promise<Uint8Array> {
    const res = await this.drive.files.get(
      { fileId: objectId, alt: 'media', supportsAllDrives: true },
      { responseType: 'arraybuffer', headers: { Range: `bytes=${start}-${end}` } }
    );
    const data: unknown = res.data;
    if (data instanceof ArrayBuffer) return new Uint8Array(data);
    if (data instanceof Uint8Array) return data;
    if (typeof data === 'string') return new TextEncoder().encode(data);
    throw new Error(`Unexpected media payload for ${objectId} (${typeof data})`);
  }

  /* ---------- Mutations ---------- */

  async annotate(objectId: string, annotation: ObjectAnnotation): Promise<void> {
    const requestBody: drive_v3.Schema$File = {};
    if (annotation.description !== undefined) requestBody.description = annotation.description;
    if (annotation.properties) requestBody.appProperties = annotation.properties;
    await this.drive.files.update({
      fileId: objectId,
      requestBody,
      fields: 'id',
      supportsAllDrives: true,
    });
  }

  async moveObject(objectId: string, targetContainerId: string): Promise<void> {
    const current = await this.drive.files.get({
      fileId: objectId,
      fields: 'parents',
      supportsAllDrives: true,
    });
    const previous = (current.data.parents ?? []).filter((p) => p !== targetContainerId);
    await this.drive.files.update({
      fileId: objectId,
      addParents: targetContainerId,
      removeParents: previous.length > 0 ? previous.join(',') : undefined,
      fields: 'id, parents',
      supportsAllDrives: true,
    });
    log.debug({ objectId, targetContainerId, removed: previous }, 'Moved object');
  }
}
