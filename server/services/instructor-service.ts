import { randomBytes } from 'crypto';
import type { Instructor, InstructorProfileUpdate } from '@shared/schema';
import { NotFoundError, ValidationError, errorMessage } from '../errors';
import type { IStorage } from '../storage';
import type { RemoteIndexClient } from './index-client';

const MAX_SLUG_LENGTH = 32;
const SLUG_SUFFIX_BYTES = 3; // 6 hex characters
const MAX_SLUG_ATTEMPTS = 5;

export function cleanEmail(email: string): string {
  return (email || '').trim().toLowerCase();
}

export function slugifyBase(text: string): string {
  const base = (text || '').trim().toLowerCase().replace(/[^a-z0-9]+/g, '');
  return base ? base.slice(0, MAX_SLUG_LENGTH) : 'instructor';
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function defaultPresentationHtml(instructor: Pick<Instructor, 'name'>): string {
  const name = escapeHtml(instructor.name?.trim() || 'your instructor');
  return [
    `<h2>Welcome to ${name}'s course assistant</h2>`,
    '<p>Ask questions about lectures, readings and assignments. Answers draw on the materials your instructor has shared.</p>',
  ].join('\n');
}

export class InstructorService {
  constructor(
    private storage: IStorage,
    private indexClient: RemoteIndexClient,
    private randomSuffix: () => string = () => randomBytes(SLUG_SUFFIX_BYTES).toString('hex'),
  ) {}

  async findByEmail(email: string): Promise<Instructor | undefined> {
    const cleaned = cleanEmail(email);
    if (!cleaned) return undefined;
    return this.storage.getInstructorByEmail(cleaned);
  }

  async findBySlug(slug: string): Promise<Instructor | undefined> {
    return this.storage.getInstructorBySlug(slug.trim().toLowerCase());
  }

  async findById(id: number): Promise<Instructor | undefined> {
    return this.storage.getInstructor(id);
  }

  async listAll(): Promise<Instructor[]> {
    return this.storage.listInstructors();
  }

  private async uniqueSlug(email: string): Promise<string> {
    const localPart = email.includes('@') ? email.split('@')[0] : email;
    const base = slugifyBase(localPart);
    if (!(await this.storage.getInstructorBySlug(base))) return base;

    for (let attempt = 0; attempt < MAX_SLUG_ATTEMPTS; attempt++) {
      const candidate = `${base}${this.randomSuffix()}`;
      if (!(await this.storage.getInstructorBySlug(candidate))) return candidate;
    }
    throw new Error(`Could not find a free slug for ${base}`);
  }

  /**
   * Registers an instructor and creates their private vector store.
   * The row is written only after the store exists; nothing is kept on failure.
   */
  async create(email: string, name?: string | null): Promise<Instructor> {
    const cleaned = cleanEmail(email);
    if (!cleaned) throw new ValidationError('Email is required');
    if (!cleaned.includes('@')) throw new ValidationError('Enter a valid email address');
    const displayName = name?.trim() || null;
    if (name !== undefined && name !== null && !displayName) {
      throw new ValidationError('Name is required');
    }
    if (await this.storage.getInstructorByEmail(cleaned)) {
      throw new ValidationError('An instructor with this email already exists');
    }

    const slug = await this.uniqueSlug(cleaned);
    const vectorStoreId = await this.indexClient.createIndex(`coursemate-${slug}`);

    try {
      const instructor = await this.storage.createInstructor({
        email: cleaned,
        name: displayName,
        slug,
        vectorStoreId,
        presentationHtml: null,
      });
      console.log(`[Instructors] Registered ${cleaned} as /${slug} with store ${vectorStoreId}`);
      return instructor;
    } catch (error) {
      console.error(`[Instructors] Failed to save ${cleaned}, removing store ${vectorStoreId}:`, errorMessage(error));
      await this.indexClient.deleteIndex(vectorStoreId).catch((cleanupError: unknown) => {
        console.warn(`[Instructors] Orphaned store ${vectorStoreId}: ${errorMessage(cleanupError)}`);
      });
      throw error;
    }
  }

  async updateProfile(id: number, update: InstructorProfileUpdate): Promise<Instructor> {
    const instructor = await this.storage.updateInstructor(id, update);
    if (!instructor) throw new NotFoundError('Instructor not found');
    return instructor;
  }

  presentationFor(instructor: Instructor): string {
    const html = instructor.presentationHtml;
    return html && html.trim() ? html : defaultPresentationHtml(instructor);
  }
}
