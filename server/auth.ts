import type { Express, NextFunction, Request, Response } from "express";
import session from "express-session";
import type { Instructor } from "@shared/schema";
import type { AppConfig } from "./config/app-config";
import type { IStorage } from "./storage";

declare module "express-session" {
  interface SessionData {
    instructorId?: number;
  }
}

declare global {
  namespace Express {
    interface Request {
      instructor?: Instructor;
    }
  }
}

export function setupSession(app: Express, config: AppConfig, storage: IStorage) {
  const isProduction = config.environment === 'production';

  console.log('[Session] Cookie configuration:', {
    environment: config.environment,
    secure: isProduction,
    sameSite: 'lax',
    maxAge: '7 days',
  });

  const sessionSettings: session.SessionOptions = {
    secret: config.sessionSecret,
    resave: false,
    saveUninitialized: true, // students get a transcript key before they sign anything
    rolling: true,
    store: storage.sessionStore,
    cookie: {
      httpOnly: true,
      secure: isProduction,
      sameSite: 'lax',
      path: '/',
      maxAge: 7 * 24 * 60 * 60 * 1000,
    },
  };

  if (isProduction) {
    app.set("trust proxy", 1);
  }
  app.use(session(sessionSettings));
}

export function signIn(req: Request, instructor: Instructor): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((error) => {
      if (error) return reject(error);
      req.session.instructorId = instructor.id;
      req.session.save((saveError) => (saveError ? reject(saveError) : resolve()));
    });
  });
}

export function signOut(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((error) => (error ? reject(error) : resolve()));
  });
}

// Loads the signed-in instructor onto req.instructor
export function requireInstructor(storage: IStorage) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instructorId = req.session.instructorId;
      if (!instructorId) {
        return res.status(401).json({ message: "Sign in with your instructor email first" });
      }
      const instructor = await storage.getInstructor(instructorId);
      if (!instructor) {
        delete req.session.instructorId;
        return res.status(401).json({ message: "Instructor account not found" });
      }
      req.instructor = instructor;
      next();
    } catch (error) {
      next(error);
    }
  };
}
