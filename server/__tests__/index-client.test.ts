import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import OpenAI from "openai";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { RemoteServiceError } from "../errors";
import { OpenAIGenerationProvider } from "../services/answer-service";
import { OpenAIIndexClient, createOpenAIClient, toRemoteServiceError } from "../services/index-client";
import { testConfig } from "./helpers/fakes";

interface RecordedRequest {
  method: string;
  path: string;
  body: string;
}

type Reply = { status: number; body: unknown };

// Stand-in for the vector store API, served in process
class StubApi {
  requests: RecordedRequest[] = [];
  routes = new Map<string, Reply>();
  private server: Server = createServer((req, res) => {
    this.handle(req, res).catch((error: unknown) => {
      res.writeHead(500);
      res.end(String(error));
    });
  });

  on(method: string, route: string, status: number, body: unknown) {
    this.routes.set(`${method} ${route}`, { status, body });
  }

  private async handle(req: IncomingMessage, res: ServerResponse) {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    const route = (req.url ?? "").split("?")[0];
    this.requests.push({ method: req.method ?? "", path: req.url ?? "", body: Buffer.concat(chunks).toString() });
    const reply = this.routes.get(`${req.method} ${route}`) ?? {
      status: 404,
      body: { error: { message: `No route ${req.method} ${route}` } },
    };
    res.writeHead(reply.status, { "content-type": "application/json" });
    res.end(JSON.stringify(reply.body));
  }

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, "127.0.0.1", resolve));
    const address = this.server.address();
    if (!address || typeof address === "string") throw new Error("Stub API is not listening on a TCP port");
    return `http://127.0.0.1:${address.port}/v1`;
  }

  async stop() {
    await new Promise<void>((resolve, reject) => this.server.close((error) => (error ? reject(error) : resolve())));
  }
}

describe("toRemoteServiceError", () => {
  it("maps timeouts to 504", () => {
    expect(toRemoteServiceError("createIndex", new OpenAI.APIConnectionTimeoutError()).status).toBe(504);
  });

  it("maps connection failures to 503", () => {
    const error = toRemoteServiceError("createIndex", new OpenAI.APIConnectionError({ message: "socket hang up" }));
    expect(error.status).toBe(503);
    expect(error.operation).toBe("createIndex");
  });

  it("maps unknown failures to 502", () => {
    const error = toRemoteServiceError("deleteIndex", new Error("boom"));
    expect(error.status).toBe(502);
    expect(error.message).toBe("deleteIndex failed: boom");
  });

  it("passes remote service errors through", () => {
    const original = new RemoteServiceError("attachDocument", 409, "conflict");
    expect(toRemoteServiceError("other", original)).toBe(original);
  });
});

describe("createOpenAIClient", () => {
  it("requires an API key", () => {
    expect(() => createOpenAIClient(testConfig({ openaiApiKey: "" }))).toThrow("OPENAI_API_KEY is not set.");
  });
});

describe("OpenAIIndexClient", () => {
  const api = new StubApi();
  let client: OpenAIIndexClient;
  let provider: OpenAIGenerationProvider;
  let workDir: string;

  beforeAll(async () => {
    const baseUrl = await api.start();
    const openai = createOpenAIClient(testConfig({ openaiBaseUrl: baseUrl }));
    client = new OpenAIIndexClient(openai);
    provider = new OpenAIGenerationProvider(openai);
    workDir = await mkdtemp(path.join(tmpdir(), "coursemate-index-"));
  });

  afterAll(async () => {
    await api.stop();
    await rm(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    api.requests = [];
    api.routes.clear();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates a named vector store", async () => {
    api.on("POST", "/v1/vector_stores", 200, { id: "vs_abc", object: "vector_store", name: "coursemate-prof" });

    expect(await client.createIndex("coursemate-prof")).toBe("vs_abc");
    expect(JSON.parse(api.requests[0].body)).toEqual({ name: "coursemate-prof" });
  });

  it("uploads a local file for retrieval", async () => {
    const localPath = path.join(workDir, "notes.txt");
    await writeFile(localPath, "lecture notes");
    api.on("POST", "/v1/files", 200, { id: "file_up", object: "file", filename: "notes.txt", purpose: "assistants" });

    expect(await client.uploadDocument(localPath, "notes.txt")).toBe("file_up");
    expect(api.requests[0].body).toContain("lecture notes");
    expect(api.requests[0].body).toContain("assistants");
  });

  it("rejects a missing local file without contacting the service", async () => {
    const error = await client.uploadDocument(path.join(workDir, "missing.pdf"), "missing.pdf").then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).not.toBeInstanceOf(RemoteServiceError);
    expect(error).toMatchObject({ code: "ENOENT" });
    expect(api.requests).toEqual([]);
  });

  it("attaches through a file batch", async () => {
    api.on("POST", "/v1/vector_stores/vs_abc/file_batches", 200, { id: "vsfb_1", status: "in_progress" });

    await client.attachDocument("vs_abc", "file_up");

    expect(JSON.parse(api.requests[0].body)).toEqual({ file_ids: ["file_up"] });
  });

  it("lists attached files with their filename attribute when present", async () => {
    api.on("GET", "/v1/vector_stores/vs_abc/files", 200, {
      object: "list",
      data: [
        { id: "file_1", object: "vector_store.file", attributes: { filename: "syllabus.pdf" } },
        { id: "file_2", object: "vector_store.file", attributes: null },
      ],
      has_more: false,
    });

    expect(await client.listAttachedDocuments("vs_abc")).toEqual([
      { documentId: "file_1", filename: "syllabus.pdf" },
      { documentId: "file_2", filename: undefined },
    ]);
    expect(api.requests[0].path).toBe("/v1/vector_stores/vs_abc/files?limit=100");
  });

  it("surfaces a missing attachment as a 404", async () => {
    api.on("DELETE", "/v1/vector_stores/vs_abc/files/file_gone", 404, { error: { message: "No such file" } });

    const error = await client.detachDocument("vs_abc", "file_gone").then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error instanceof RemoteServiceError && error.isNotFound).toBe(true);
  });

  it("resolves filenames and hides lookup failures", async () => {
    api.on("GET", "/v1/files/file_1", 200, { id: "file_1", object: "file", filename: "week1.pdf" });
    api.on("GET", "/v1/files/file_bad", 500, { error: { message: "internal error" } });

    expect(await client.lookupFilename("file_1")).toBe("week1.pdf");
    expect(await client.lookupFilename("file_bad")).toBeUndefined();
  });

  it("sends file_search over the requested stores", async () => {
    api.on("POST", "/v1/responses", 200, {
      id: "resp_1",
      object: "response",
      output: [
        { type: "file_search_call", id: "fs_1", status: "completed", queries: ["exam"] },
        {
          type: "message",
          id: "msg_1",
          role: "assistant",
          status: "completed",
          content: [{ type: "output_text", text: "The exam is on Friday.", annotations: [] }],
        },
      ],
    });

    const response = await provider.generate({
      model: "test-model",
      turns: [{ role: "user", content: "When is the exam?" }],
      vectorStoreIds: ["vs_abc", "vs_common"],
    });

    expect(response).toEqual({ kind: "direct_text", text: "The exam is on Friday." });
    const body = JSON.parse(api.requests[0].body);
    expect(body.model).toBe("test-model");
    expect(body.tools).toEqual([{ type: "file_search", vector_store_ids: ["vs_abc", "vs_common"] }]);
    expect(body.input).toEqual([{ role: "user", content: "When is the exam?" }]);
  });

  it("returns structured items when the response has no text", async () => {
    api.on("POST", "/v1/responses", 200, {
      id: "resp_2",
      object: "response",
      output: [
        {
          type: "message",
          id: "msg_2",
          role: "assistant",
          status: "completed",
          content: [{ type: "refusal", refusal: "I can't help with that." }],
        },
      ],
    });

    const response = await provider.generate({ model: "test-model", turns: [], vectorStoreIds: [] });

    expect(response).toEqual({
      kind: "structured_output",
      items: [{ type: "refusal", text: "I can't help with that." }],
    });
    expect(JSON.parse(api.requests[0].body).tools).toBeUndefined();
  });
});
