import { Firestore } from '@google-cloud/firestore';

export function createFirestoreClient(): Firestore {
  return new Firestore({
    projectId: process.env['AGORA_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'],
    ignoreUndefinedProperties: true,
  });
}
