import type { Express, NextFunction, Request, Response } from "express";
import express from "express";
import multer from "multer";
import { createServer, type Server } from "http";
import { z } from "zod";
import {
  chatMessageSchema,
  loginInstructorSchema,
  registerInstructorSchema,
  updateInstructorSchema,
  type Instructor,
} from "@shared/schema";
import type { AppConfig } from "./config/app-config";
import { getAssistantPersona } from "./config/assistant-persona";
import { ValidationError, errorMessage, httpStatusFor } from "./errors";
import { requireInstructor, setupSession, signIn, signOut } from "./auth";
import type { IStorage } from "./storage";
import type { AnswerComposer } from "./services/answer-service";
import { ConversationSession, type TranscriptStore } from "./services/conversation-service";
import type { DocumentService } from "./services/document-service";
import type { InstructorService } from "./services/instructor-service";

export interface AppServices {
  config: AppConfig;
  storage: IStorage;
  instructors: InstructorService;
  documents: DocumentService;
  composer: AnswerComposer;
  transcripts: TranscriptStore;
}

const MAX_FILES_PER_UPLOAD = 20;

function sendError(res: Response, error: unknown, context: string) {
  const status = httpStatusFor(error);
  if (status >= 500) {
    console.error(`[Routes] ${context}:`, error);
  }
  const message = status === 500 ? `${context}: ${errorMessage(error)}` : errorMessage(error);
  res.status(status).json({ message });
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  return parsed.data;
}

function publicInstructor(instructor: Instructor) {
  return {
    id: instructor.id,
    email: instructor.email,
    name: instructor.name,
    slug: instructor.slug,
    createdAt: instructor.createdAt,
    updatedAt: instructor.updatedAt,
  };
}

function signedInInstructor(req: Request): Instructor {
  if (!req.instructor) throw new Error("requireInstructor middleware did not run");
  return req.instructor;
}

export async function registerRoutes(app: Express, services: AppServices): Promise<Server> {
  const { config, storage, instructors, documents, composer, transcripts } = services;

  app.use(express.json({ limit: "1mb" }));
  setupSession(app, config, storage);

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: MAX_FILES_PER_UPLOAD },
  });
  const instructorOnly = requireInstructor(storage);

  async function chatSessionFor(req: Request, res: Response): Promise<ConversationSession | undefined> {
    const instructor = await instructors.findBySlug(req.params.slug);
    if (!instructor) {
      res.status(404).json({ message: "Instructor not found" });
      return undefined;
    }
    return new ConversationSession(instructor, req.sessionID, transcripts, composer);
  }

  app.get("/api/health", (req, res) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      env: config.environment,
      model: config.assistantModel,
      commonFiles: !!config.commonVectorStoreId,
    });
  });

  // Instructor registration and sign-in (email-keyed, no password)
  app.post("/api/instructors", async (req, res) => {
    try {
      const { email, name } = parseBody(registerInstructorSchema, req.body);
      const instructor = await instructors.create(email, name);
      await signIn(req, instructor);
      res.status(201).json(publicInstructor(instructor));
    } catch (error) {
      sendError(res, error, "Failed to register instructor");
    }
  });

  app.post("/api/auth/login", async (req, res) => {
    try {
      const { email } = parseBody(loginInstructorSchema, req.body);
      const instructor = await instructors.findByEmail(email);
      if (!instructor) {
        return res.status(404).json({ message: "No instructor with this email. Register first.", needsOnboarding: true });
      }
      await signIn(req, instructor);
      res.json(publicInstructor(instructor));
    } catch (error) {
      sendError(res, error, "Failed to sign in");
    }
  });

  app.post("/api/auth/logout", async (req, res) => {
    try {
      await signOut(req);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "Failed to sign out");
    }
  });

  app.get("/api/instructors", async (req, res) => {
    try {
      const all = await instructors.listAll();
      res.json(all.map(publicInstructor));
    } catch (error) {
      sendError(res, error, "Failed to list instructors");
    }
  });

  app.get("/api/instructor", instructorOnly, (req, res) => {
    const instructor = signedInInstructor(req);
    res.json({ ...publicInstructor(instructor), presentationHtml: instructors.presentationFor(instructor) });
  });

  app.patch("/api/instructor", instructorOnly, async (req, res) => {
    try {
      const update = parseBody(updateInstructorSchema, req.body);
      const instructor = await instructors.updateProfile(signedInInstructor(req).id, update);
      res.json({ ...publicInstructor(instructor), presentationHtml: instructors.presentationFor(instructor) });
    } catch (error) {
      sendError(res, error, "Failed to update profile");
    }
  });

  // Document management
  app.get("/api/instructor/documents", instructorOnly, async (req, res) => {
    try {
      const [own, common] = await Promise.all([
        documents.listVisible(signedInInstructor(req)),
        documents.listCommonFilenames(),
      ]);
      res.json({ documents: own, commonFilenames: common });
    } catch (error) {
      sendError(res, error, "Failed to list documents");
    }
  });

  app.post("/api/instructor/documents", instructorOnly, upload.array("files", MAX_FILES_PER_UPLOAD), async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      const result = await documents.attachMany(
        signedInInstructor(req),
        files.map((file) => ({ originalName: file.originalname, buffer: file.buffer })),
      );
      const status = result.attached.length > 0 ? 201 : 502;
      res.status(status).json({
        uploaded: result.attached.length,
        documents: result.attached,
        errors: result.errors,
      });
    } catch (error) {
      sendError(res, error, "Failed to upload documents");
    }
  });

  app.delete("/api/instructor/documents/:fileId", instructorOnly, async (req, res) => {
    try {
      await documents.detach(signedInInstructor(req), req.params.fileId);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "Failed to delete document");
    }
  });

  app.post("/api/instructor/documents/reconcile", instructorOnly, async (req, res) => {
    try {
      res.json(await documents.reconcile(signedInInstructor(req)));
    } catch (error) {
      sendError(res, error, "Failed to reconcile documents");
    }
  });

  // Student-facing assistant
  app.get("/api/i/:slug", async (req, res) => {
    try {
      const instructor = await instructors.findBySlug(req.params.slug);
      if (!instructor) {
        return res.status(404).json({ message: "Instructor not found" });
      }
      res.json({
        name: instructor.name,
        slug: instructor.slug,
        presentationHtml: instructors.presentationFor(instructor),
        greeting: getAssistantPersona().interactions.greetings[0],
      });
    } catch (error) {
      sendError(res, error, "Failed to load instructor");
    }
  });

  app.get("/api/i/:slug/chat", async (req, res) => {
    try {
      const chat = await chatSessionFor(req, res);
      if (!chat) return;
      res.json({ state: await chat.state(), messages: await chat.transcript() });
    } catch (error) {
      sendError(res, error, "Failed to load conversation");
    }
  });

  app.post("/api/i/:slug/chat", async (req, res) => {
    try {
      const { message } = parseBody(chatMessageSchema, req.body);
      const chat = await chatSessionFor(req, res);
      if (!chat) return;
      await chat.appendUserTurn(message);
      const answer = await chat.requestAnswer();
      res.json({ answer, messages: await chat.transcript() });
    } catch (error) {
      sendError(res, error, "Failed to answer");
    }
  });

  app.post("/api/i/:slug/chat/reset", async (req, res) => {
    try {
      const chat = await chatSessionFor(req, res);
      if (!chat) return;
      await chat.reset();
      res.json({ state: await chat.state(), messages: [] });
    } catch (error) {
      sendError(res, error, "Failed to reset conversation");
    }
  });

  // Multer limits and anything thrown outside a handler
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error);
    if (error instanceof multer.MulterError) {
      return res.status(400).json({ message: error.message });
    }
    sendError(res, error, "Request failed");
  });

  return createServer(app);
}
