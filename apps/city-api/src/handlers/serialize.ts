import type { StoredDocument } from '@cityscope/types';

export type DocumentJson = { id: string } & StoredDocument['data'];

/**
 * Flatten a stored document into its response shape. Dates serialize as ISO
 * strings through res.json.
 */
export function toDocumentJson(doc: StoredDocument): DocumentJson {
    return { ...doc.data, id: doc.id };
}
