/**
 * Vector store client
 * Thin adapter over the OpenAI files and vector store APIs. Every call runs once
 * with a fixed timeout; failures surface as RemoteServiceError.
 */

import { readFile } from 'fs/promises';
import OpenAI, { toFile } from 'openai';
import type { AppConfig } from '../config/app-config';
import { ConfigurationError, RemoteServiceError, errorMessage } from '../errors';

export interface AttachedDocument {
  documentId: string;
  filename?: string;
}

export interface RemoteIndexClient {
  createIndex(name: string): Promise<string>;
  deleteIndex(indexId: string): Promise<void>;
  /** Reads `localPath` first; a failed local read rejects with the fs error and sends nothing. */
  uploadDocument(localPath: string, filename: string): Promise<string>;
  attachDocument(indexId: string, documentId: string): Promise<void>;
  detachDocument(indexId: string, documentId: string): Promise<void>;
  deleteDocument(documentId: string): Promise<void>;
  listAttachedDocuments(indexId: string): Promise<AttachedDocument[]>;
  /** Secondary metadata lookup. Never throws; `undefined` when the lookup fails. */
  lookupFilename(documentId: string): Promise<string | undefined>;
}

const LIST_LIMIT = 100;

export function toRemoteServiceError(operation: string, error: unknown): RemoteServiceError {
  if (error instanceof RemoteServiceError) return error;
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new RemoteServiceError(operation, 504, `${operation} timed out`);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new RemoteServiceError(operation, 503, `${operation} could not reach the service: ${error.message}`);
  }
  if (error instanceof OpenAI.APIError) {
    return new RemoteServiceError(operation, error.status ?? 502, error.message);
  }
  return new RemoteServiceError(operation, 502, `${operation} failed: ${errorMessage(error)}`);
}

export function createOpenAIClient(config: AppConfig): OpenAI {
  if (!config.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is not set.');
  }
  return new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    timeout: config.remoteTimeoutMs,
    maxRetries: 0,
  });
}

function readFilenameAttribute(file: object): string | undefined {
  if (!('attributes' in file)) return undefined;
  const attributes = file.attributes;
  if (typeof attributes !== 'object' || attributes === null || !('filename' in attributes)) return undefined;
  return typeof attributes.filename === 'string' && attributes.filename ? attributes.filename : undefined;
}

export class OpenAIIndexClient implements RemoteIndexClient {
  constructor(private client: OpenAI) {}

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const remoteError = toRemoteServiceError(operation, error);
      console.error(`[Index] ${operation} failed (${remoteError.status}): ${remoteError.message}`);
      throw remoteError;
    }
  }

  async createIndex(name: string): Promise<string> {
    const store = await this.call('createIndex', () => this.client.vectorStores.create({ name }));
    console.log(`[Index] Created vector store ${store.id} (${name})`);
    return store.id;
  }

  async deleteIndex(indexId: string): Promise<void> {
    await this.call('deleteIndex', () => this.client.vectorStores.del(indexId));
    console.log(`[Index] Deleted vector store ${indexId}`);
  }

  async uploadDocument(localPath: string, filename: string): Promise<string> {
    // Local I/O stays outside call(): it is not a remote failure
    const bytes = await readFile(localPath);
    const file = await this.call('uploadDocument', async () =>
      this.client.files.create({ file: await toFile(bytes, filename), purpose: 'assistants' }),
    );
    console.log(`[Index] Uploaded ${filename} as ${file.id}`);
    return file.id;
  }

  async attachDocument(indexId: string, documentId: string): Promise<void> {
    await this.call('attachDocument', () =>
      this.client.vectorStores.fileBatches.create(indexId, { file_ids: [documentId] }),
    );
    console.log(`[Index] Attached ${documentId} to ${indexId}`);
  }

  async detachDocument(indexId: string, documentId: string): Promise<void> {
    await this.call('detachDocument', () => this.client.vectorStores.files.del(indexId, documentId));
    console.log(`[Index] Detached ${documentId} from ${indexId}`);
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.call('deleteDocument', () => this.client.files.del(documentId));
  }

  async listAttachedDocuments(indexId: string): Promise<AttachedDocument[]> {
    const page = await this.call('listAttachedDocuments', () =>
      this.client.vectorStores.files.list(indexId, { limit: LIST_LIMIT }),
    );
    return page.data.map((file) => ({ documentId: file.id, filename: readFilenameAttribute(file) }));
  }

  async lookupFilename(documentId: string): Promise<string | undefined> {
    try {
      const file = await this.client.files.retrieve(documentId);
      return file.filename || undefined;
    } catch (error) {
      console.warn(`[Index] Filename lookup for ${documentId} failed: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
