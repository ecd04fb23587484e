import express from "express";
import { loadConfig, type AppConfig } from "./config/app-config";
import { createDatabase } from "./db";
import { ConfigurationError } from "./errors";
import { registerRoutes, type AppServices } from "./routes";
import { AnswerComposer, OpenAIGenerationProvider } from "./services/answer-service";
import { MemoryTranscriptStore } from "./services/conversation-service";
import { DocumentService } from "./services/document-service";
import { OpenAIIndexClient, createOpenAIClient } from "./services/index-client";
import { InstructorService } from "./services/instructor-service";
import { DatabaseStorage, MemStorage, type IStorage } from "./storage";

function createStorage(config: AppConfig): IStorage {
  if (!config.databaseUrl) {
    console.warn("[Storage] DATABASE_URL is not set - using in-memory storage (data is lost on restart)");
    return new MemStorage();
  }
  const { db, pool } = createDatabase(config.databaseUrl);
  return new DatabaseStorage(db, pool);
}

export function createServices(config: AppConfig): AppServices {
  const openai = createOpenAIClient(config);
  const indexClient = new OpenAIIndexClient(openai);
  const storage = createStorage(config);
  const composer = new AnswerComposer(config, new OpenAIGenerationProvider(openai));

  return {
    config,
    storage,
    instructors: new InstructorService(storage, indexClient),
    documents: new DocumentService(config, storage, indexClient),
    composer,
    transcripts: new MemoryTranscriptStore(config.transcriptTtlMs),
  };
}

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[Config] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const app = express();
  const server = await registerRoutes(app, createServices(config));

  server.listen(config.port, "0.0.0.0", () => {
    console.log(`[Server] Listening on port ${config.port} (${config.environment})`);
  });
}

main().catch((error: unknown) => {
  console.error("[Server] Failed to start:", error);
  process.exit(1);
});
