import session from "express-session";
import connectPg from "connect-pg-simple";
import { and, desc, eq } from "drizzle-orm";
import type { Pool } from "pg";
import {
  instructors,
  instructorDocuments,
  insertInstructorSchema,
  insertInstructorDocumentSchema,
  type Instructor,
  type InsertInstructor,
  type InstructorDocument,
  type InsertInstructorDocument,
  type InstructorProfileUpdate,
} from "@shared/schema";
import type { Database } from "./db";

export interface IStorage {
  sessionStore: session.Store;

  getInstructor(id: number): Promise<Instructor | undefined>;
  getInstructorByEmail(email: string): Promise<Instructor | undefined>;
  getInstructorBySlug(slug: string): Promise<Instructor | undefined>;
  listInstructors(): Promise<Instructor[]>;
  createInstructor(data: InsertInstructor): Promise<Instructor>;
  updateInstructor(id: number, update: InstructorProfileUpdate): Promise<Instructor | undefined>;

  listInstructorDocuments(instructorId: number): Promise<InstructorDocument[]>;
  getInstructorDocument(instructorId: number, fileId: string): Promise<InstructorDocument | undefined>;
  createInstructorDocument(data: InsertInstructorDocument): Promise<InstructorDocument>;
  deleteInstructorDocument(instructorId: number, fileId: string): Promise<boolean>;
}

// Callers pass emails already trimmed and lower-cased
export class DatabaseStorage implements IStorage {
  sessionStore: session.Store;

  constructor(private db: Database, pool: Pool) {
    const PostgresSessionStore = connectPg(session);
    this.sessionStore = new PostgresSessionStore({
      pool,
      tableName: "sessions",
      createTableIfMissing: true,
    });
  }

  async getInstructor(id: number): Promise<Instructor | undefined> {
    const [instructor] = await this.db.select().from(instructors).where(eq(instructors.id, id));
    return instructor;
  }

  async getInstructorByEmail(email: string): Promise<Instructor | undefined> {
    const [instructor] = await this.db.select().from(instructors).where(eq(instructors.email, email));
    return instructor;
  }

  async getInstructorBySlug(slug: string): Promise<Instructor | undefined> {
    const [instructor] = await this.db.select().from(instructors).where(eq(instructors.slug, slug));
    return instructor;
  }

  async listInstructors(): Promise<Instructor[]> {
    return this.db.select().from(instructors).orderBy(desc(instructors.createdAt), desc(instructors.id));
  }

  async createInstructor(data: InsertInstructor): Promise<Instructor> {
    const values = insertInstructorSchema.parse(data);
    const [instructor] = await this.db.insert(instructors).values(values).returning();
    return instructor;
  }

  async updateInstructor(id: number, update: InstructorProfileUpdate): Promise<Instructor | undefined> {
    const [instructor] = await this.db
      .update(instructors)
      .set({ ...update, updatedAt: new Date() })
      .where(eq(instructors.id, id))
      .returning();
    return instructor;
  }

  async listInstructorDocuments(instructorId: number): Promise<InstructorDocument[]> {
    return this.db
      .select()
      .from(instructorDocuments)
      .where(eq(instructorDocuments.instructorId, instructorId))
      .orderBy(desc(instructorDocuments.uploadedAt), desc(instructorDocuments.id));
  }

  async getInstructorDocument(instructorId: number, fileId: string): Promise<InstructorDocument | undefined> {
    const [document] = await this.db
      .select()
      .from(instructorDocuments)
      .where(and(eq(instructorDocuments.instructorId, instructorId), eq(instructorDocuments.fileId, fileId)));
    return document;
  }

  async createInstructorDocument(data: InsertInstructorDocument): Promise<InstructorDocument> {
    const values = insertInstructorDocumentSchema.parse(data);
    const [document] = await this.db.insert(instructorDocuments).values(values).returning();
    return document;
  }

  async deleteInstructorDocument(instructorId: number, fileId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(instructorDocuments)
      .where(and(eq(instructorDocuments.instructorId, instructorId), eq(instructorDocuments.fileId, fileId)))
      .returning({ id: instructorDocuments.id });
    return deleted.length > 0;
  }
}

// In-process storage for development without DATABASE_URL and for tests
export class MemStorage implements IStorage {
  sessionStore: session.Store = new session.MemoryStore();

  private instructors = new Map<number, Instructor>();
  private documents = new Map<number, InstructorDocument>();
  private nextInstructorId = 1;
  private nextDocumentId = 1;

  async getInstructor(id: number): Promise<Instructor | undefined> {
    return this.instructors.get(id);
  }

  async getInstructorByEmail(email: string): Promise<Instructor | undefined> {
    return Array.from(this.instructors.values()).find((instructor) => instructor.email === email);
  }

  async getInstructorBySlug(slug: string): Promise<Instructor | undefined> {
    return Array.from(this.instructors.values()).find((instructor) => instructor.slug === slug);
  }

  async listInstructors(): Promise<Instructor[]> {
    return Array.from(this.instructors.values()).sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id,
    );
  }

  async createInstructor(data: InsertInstructor): Promise<Instructor> {
    const values = insertInstructorSchema.parse(data);
    for (const existing of Array.from(this.instructors.values())) {
      if (existing.email === values.email) throw new Error(`duplicate key value: email ${values.email}`);
      if (existing.slug === values.slug) throw new Error(`duplicate key value: slug ${values.slug}`);
    }
    const now = new Date();
    const instructor: Instructor = {
      id: this.nextInstructorId++,
      email: values.email,
      name: values.name ?? null,
      slug: values.slug,
      vectorStoreId: values.vectorStoreId,
      presentationHtml: values.presentationHtml ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.instructors.set(instructor.id, instructor);
    return instructor;
  }

  async updateInstructor(id: number, update: InstructorProfileUpdate): Promise<Instructor | undefined> {
    const existing = this.instructors.get(id);
    if (!existing) return undefined;
    const updated: Instructor = {
      ...existing,
      name: update.name !== undefined ? update.name : existing.name,
      presentationHtml: update.presentationHtml !== undefined ? update.presentationHtml : existing.presentationHtml,
      updatedAt: new Date(),
    };
    this.instructors.set(id, updated);
    return updated;
  }

  async listInstructorDocuments(instructorId: number): Promise<InstructorDocument[]> {
    return Array.from(this.documents.values())
      .filter((document) => document.instructorId === instructorId)
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime() || b.id - a.id);
  }

  async getInstructorDocument(instructorId: number, fileId: string): Promise<InstructorDocument | undefined> {
    return Array.from(this.documents.values()).find(
      (document) => document.instructorId === instructorId && document.fileId === fileId,
    );
  }

  async createInstructorDocument(data: InsertInstructorDocument): Promise<InstructorDocument> {
    const values = insertInstructorDocumentSchema.parse(data);
    if (await this.getInstructorDocument(values.instructorId, values.fileId)) {
      throw new Error(`duplicate key value: file ${values.fileId}`);
    }
    const document: InstructorDocument = {
      id: this.nextDocumentId++,
      instructorId: values.instructorId,
      fileId: values.fileId,
      filename: values.filename,
      uploadedAt: new Date(),
    };
    this.documents.set(document.id, document);
    return document;
  }

  async deleteInstructorDocument(instructorId: number, fileId: string): Promise<boolean> {
    const document = await this.getInstructorDocument(instructorId, fileId);
    if (!document) return false;
    return this.documents.delete(document.id);
  }
}
