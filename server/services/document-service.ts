/**
 * Document attachment workflow
 * Keeps instructor_documents in step with the instructor's vector store:
 * a row is written only after the file is attached remotely, and removed only
 * after the remote side has let go of it.
 */

import { randomUUID } from 'crypto';
import { mkdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import type { Instructor, InstructorDocument } from '@shared/schema';
import type { AppConfig } from '../config/app-config';
import { ConsistencyError, RemoteServiceError, ValidationError, errorMessage } from '../errors';
import type { IStorage } from '../storage';
import { sanitizeFilename } from '../utils/filename';
import type { RemoteIndexClient } from './index-client';

const MAX_TEMP_EXTENSION = 16;

export interface IncomingFile {
  originalName: string;
  buffer: Buffer;
}

export interface AttachFailure {
  filename: string;
  message: string;
}

export interface AttachBatchResult {
  attached: InstructorDocument[];
  errors: AttachFailure[];
}

export interface ReconcileResult {
  detached: string[];
  missingRemote: InstructorDocument[];
  errors: AttachFailure[];
}

export class DocumentService {
  constructor(
    private config: Pick<AppConfig, 'uploadDir' | 'commonVectorStoreId'>,
    private storage: IStorage,
    private indexClient: RemoteIndexClient,
  ) {}

  private async bestEffort(label: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      console.warn(`[Documents] ${label} failed: ${errorMessage(error)}`);
    }
  }

  async attach(instructor: Instructor, file: IncomingFile): Promise<InstructorDocument> {
    const filename = sanitizeFilename(file.originalName);
    await mkdir(this.config.uploadDir, { recursive: true });
    const tempPath = path.join(this.config.uploadDir, `${randomUUID()}${path.extname(filename).slice(0, MAX_TEMP_EXTENSION)}`);

    try {
      await writeFile(tempPath, file.buffer);
      const fileId = await this.indexClient.uploadDocument(tempPath, filename);

      try {
        await this.indexClient.attachDocument(instructor.vectorStoreId, fileId);
      } catch (error) {
        await this.bestEffort(`Removing unattached file ${fileId}`, () => this.indexClient.deleteDocument(fileId));
        throw error;
      }

      try {
        const document = await this.storage.createInstructorDocument({
          instructorId: instructor.id,
          fileId,
          filename,
        });
        console.log(`[Documents] ${filename} attached for instructor ${instructor.id} as ${fileId}`);
        return document;
      } catch (error) {
        await this.bestEffort(`Detaching ${fileId} after failed save`, async () => {
          await this.indexClient.detachDocument(instructor.vectorStoreId, fileId);
          await this.indexClient.deleteDocument(fileId);
        });
        throw new ConsistencyError(`Saved ${filename} remotely but could not record it: ${errorMessage(error)}`, error);
      }
    } finally {
      await this.bestEffort(`Removing temporary file ${tempPath}`, () => rm(tempPath, { force: true }));
    }
  }

  /** Each file is processed on its own; one failure does not stop the rest. */
  async attachMany(instructor: Instructor, files: IncomingFile[]): Promise<AttachBatchResult> {
    if (files.length === 0) {
      throw new ValidationError('No file selected');
    }
    const result: AttachBatchResult = { attached: [], errors: [] };
    for (const file of files) {
      try {
        result.attached.push(await this.attach(instructor, file));
      } catch (error) {
        console.error(`[Documents] Upload of ${file.originalName} failed: ${errorMessage(error)}`);
        result.errors.push({ filename: file.originalName, message: errorMessage(error) });
      }
    }
    return result;
  }

  /**
   * Detaches a file from the instructor's store, then drops the local row.
   * The remote detach is made even when no local row exists; a 404 counts as
   * already detached. Any other remote failure leaves the row in place.
   * The file itself is deleted only when this instructor holds its row.
   */
  async detach(instructor: Instructor, fileId: string): Promise<void> {
    const document = await this.storage.getInstructorDocument(instructor.id, fileId);
    if (!document) {
      console.log(`[Documents] No local record for ${fileId}, detaching remotely anyway`);
    }

    try {
      await this.indexClient.detachDocument(instructor.vectorStoreId, fileId);
    } catch (error) {
      if (!(error instanceof RemoteServiceError && error.isNotFound)) {
        throw error;
      }
      console.log(`[Documents] ${fileId} was already detached from ${instructor.vectorStoreId}`);
    }

    if (document) {
      await this.bestEffort(`Deleting file ${fileId}`, () => this.indexClient.deleteDocument(fileId));
      try {
        await this.storage.deleteInstructorDocument(instructor.id, fileId);
      } catch (error) {
        throw new ConsistencyError(`Detached ${fileId} but could not remove its record: ${errorMessage(error)}`, error);
      }
    }
    console.log(`[Documents] ${fileId} detached for instructor ${instructor.id}`);
  }

  async listVisible(instructor: Instructor): Promise<InstructorDocument[]> {
    return this.storage.listInstructorDocuments(instructor.id);
  }

  // Display only: every failure yields an empty list
  async listCommonFilenames(): Promise<string[]> {
    const storeId = this.config.commonVectorStoreId;
    if (!storeId) return [];

    try {
      const attached = await this.indexClient.listAttachedDocuments(storeId);
      const names = new Set<string>();
      for (const entry of attached) {
        // lookupFilename resolves to undefined instead of throwing; such entries are left out
        const name = entry.filename ?? (await this.indexClient.lookupFilename(entry.documentId));
        if (name) names.add(name);
      }
      return Array.from(names).sort();
    } catch (error) {
      console.warn(`[Documents] Could not list common files: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Compares the instructor's store with local rows. Remote attachments without a
   * row are detached; rows the store no longer has are reported and kept.
   */
  async reconcile(instructor: Instructor): Promise<ReconcileResult> {
    const [attached, documents] = await Promise.all([
      this.indexClient.listAttachedDocuments(instructor.vectorStoreId),
      this.storage.listInstructorDocuments(instructor.id),
    ]);
    const localIds = new Set(documents.map((document) => document.fileId));
    const remoteIds = new Set(attached.map((entry) => entry.documentId));
    const result: ReconcileResult = {
      detached: [],
      missingRemote: documents.filter((document) => !remoteIds.has(document.fileId)),
      errors: [],
    };

    for (const entry of attached) {
      if (localIds.has(entry.documentId)) continue;
      try {
        await this.indexClient.detachDocument(instructor.vectorStoreId, entry.documentId);
        result.detached.push(entry.documentId);
      } catch (error) {
        result.errors.push({ filename: entry.filename ?? entry.documentId, message: errorMessage(error) });
      }
    }

    console.log(
      `[Documents] Reconciled instructor ${instructor.id}: ${result.detached.length} detached, ` +
        `${result.missingRemote.length} missing remotely, ${result.errors.length} errors`,
    );
    return result;
  }
}
