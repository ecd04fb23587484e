import {
  pgTable,
  serial,
  text,
  varchar,
  timestamp,
  integer,
  jsonb,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Session storage table (connect-pg-simple layout)
export const sessions = pgTable(
  "sessions",
  {
    sid: varchar("sid").primaryKey(),
    sess: jsonb("sess").notNull(),
    expire: timestamp("expire", { precision: 6 }).notNull(),
  },
  (table) => [index("IDX_session_expire").on(table.expire)],
);

// Instructors own a private vector store; email is stored lower-cased
export const instructors = pgTable("instructors", {
  id: serial("id").primaryKey(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  name: varchar("name", { length: 255 }),
  slug: varchar("slug", { length: 64 }).notNull().unique(),
  vectorStoreId: varchar("vector_store_id", { length: 255 }).notNull(), // assigned once at creation
  presentationHtml: text("presentation_html"), // left-column content on the student page
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// Local mirror of the files attached to an instructor's vector store
export const instructorDocuments = pgTable("instructor_documents", {
  id: serial("id").primaryKey(),
  instructorId: integer("instructor_id").notNull().references(() => instructors.id, { onDelete: 'cascade' }),
  fileId: varchar("file_id", { length: 255 }).notNull(), // OpenAI file id
  filename: varchar("filename", { length: 255 }).notNull(), // sanitized
  uploadedAt: timestamp("uploaded_at").notNull().defaultNow(),
}, (table) => [
  uniqueIndex("idx_instructor_documents_file").on(table.instructorId, table.fileId),
  index("idx_instructor_documents_uploaded").on(table.uploadedAt),
]);

export const instructorsRelations = relations(instructors, ({ many }) => ({
  documents: many(instructorDocuments),
}));

export const instructorDocumentsRelations = relations(instructorDocuments, ({ one }) => ({
  instructor: one(instructors, {
    fields: [instructorDocuments.instructorId],
    references: [instructors.id],
  }),
}));

export const insertInstructorSchema = createInsertSchema(instructors).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertInstructorDocumentSchema = createInsertSchema(instructorDocuments).omit({
  id: true,
  uploadedAt: true,
});

// Request payloads
export const registerInstructorSchema = z.object({
  email: z.string().trim().min(1, "Email is required").email("Enter a valid email address"),
  name: z.string().trim().min(1, "Name is required").max(255),
});

export const loginInstructorSchema = z.object({
  email: z.string().trim().min(1, "Email is required"),
});

export const updateInstructorSchema = z.object({
  name: z.string().trim().min(1, "Name cannot be blank").max(255).optional(),
  presentationHtml: z.string().max(20000).nullable().optional(),
});

export const chatMessageSchema = z.object({
  message: z.string().trim().min(1, "Message cannot be blank").max(8000),
});

export type Instructor = typeof instructors.$inferSelect;
export type InsertInstructor = z.infer<typeof insertInstructorSchema>;
export type InstructorDocument = typeof instructorDocuments.$inferSelect;
export type InsertInstructorDocument = z.infer<typeof insertInstructorDocumentSchema>;
export type InstructorProfileUpdate = z.infer<typeof updateInstructorSchema>;

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}
