import type { PublicationRecord, ZoteroItem, ZoteroItemData } from '../src/types.js';

export function jsonResponse(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json', ...init.headers },
  });
}

export function textResponse(
  body: string,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(body, {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'text/plain', ...init.headers },
  });
}

type RecordInput = Omit<Partial<PublicationRecord>, 'provenance'> & { provenance?: string[] };

export function record(input: RecordInput = {}): PublicationRecord {
  const { provenance = [], ...rest } = input;
  return {
    title: 'Untitled',
    authors: [],
    ...rest,
    provenance: new Set(provenance),
  };
}

export function zoteroItem(key: string, data: Partial<ZoteroItemData> = {}): ZoteroItem {
  return {
    key,
    version: 1,
    library: { type: 'user', id: 123 },
    data: { itemType: 'journalArticle', ...data },
  };
}
