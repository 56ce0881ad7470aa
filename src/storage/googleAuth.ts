// src/storage/googleAuth.ts
// Service-account credentials for the Drive and Sheets clients.

import { google } from 'googleapis';

export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/spreadsheets',
];

export interface ServiceAccountKey {
  client_email: string;
  private_key: string;
  project_id?: string;
}

export function parseServiceAccountKey(raw: string): ServiceAccountKey {
  if (!raw.trim()) {
    throw new Error('GCP_SA_KEY is not set. Set it to the service-account JSON to use Google Drive.');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error('GCP_SA_KEY is not valid JSON', { cause: err });
  }
  if (!parsed || typeof parsed !== 'object') {
    throw new Error('GCP_SA_KEY must be a JSON object');
  }
  const email: unknown = Reflect.get(parsed, 'client_email');
  const key: unknown = Reflect.get(parsed, 'private_key');
  const projectId: unknown = Reflect.get(parsed, 'project_id');
  if (typeof email !== 'string' || typeof key !== 'string') {
    throw new Error('GCP_SA_KEY is missing client_email or private_key');
  }
  return {
    client_email: email,
    // Keys pasted into env files often carry escaped newlines.
    private_key: key.replace(/\\n/g, '\n'),
    project_id: typeof projectId === 'string' ? projectId : undefined,
  };
}

export function createGoogleAuth(serviceAccountJson: string) {
  const key = parseServiceAccountKey(serviceAccountJson);
  return new google.auth.GoogleAuth({
    credentials: { client_email: key.client_email, private_key: key.private_key },
    projectId: key.project_id,
    scopes: GOOGLE_SCOPES,
  });
}

export type GoogleAuthClient = ReturnType<typeof createGoogleAuth>;
