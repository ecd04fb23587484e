import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { InsertInstructor, Instructor } from "@shared/schema";
import { RemoteServiceError, ValidationError } from "../errors";
import { InstructorService, cleanEmail, defaultPresentationHtml, slugifyBase } from "../services/instructor-service";
import { MemStorage } from "../storage";
import { FakeIndexClient } from "./helpers/fakes";

describe("slug helpers", () => {
  it("strips everything but lower-case letters and digits", () => {
    expect(slugifyBase("Jane.Doe-42")).toBe("janedoe42");
  });

  it("falls back to 'instructor' when nothing is left", () => {
    expect(slugifyBase("...")).toBe("instructor");
    expect(slugifyBase("")).toBe("instructor");
  });

  it("truncates to 32 characters", () => {
    expect(slugifyBase("x".repeat(40))).toBe("x".repeat(32));
  });

  it("normalizes emails", () => {
    expect(cleanEmail("  Prof.Smith@School.EDU ")).toBe("prof.smith@school.edu");
  });
});

describe("InstructorService", () => {
  let storage: MemStorage;
  let indexClient: FakeIndexClient;
  let service: InstructorService;

  beforeEach(() => {
    storage = new MemStorage();
    indexClient = new FakeIndexClient();
    service = new InstructorService(storage, indexClient);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates an instructor with a slug from the email's local part and a private store", async () => {
    const instructor = await service.create("a@school.edu", "A");

    expect(instructor.slug).toBe("a");
    expect(instructor.name).toBe("A");
    expect(instructor.vectorStoreId).toBe("vs_1");
    expect(indexClient.callsTo("createIndex")).toEqual([{ operation: "createIndex", args: ["coursemate-a"] }]);
  });

  it("appends a 6 character suffix when the base slug is taken", async () => {
    await service.create("a@school.edu", "A");
    const second = await service.create("a@college.edu", "A2");

    expect(second.slug).toMatch(/^a[0-9a-f]{6}$/);
    expect(second.slug).not.toBe("a");
  });

  it("re-rolls the suffix until the slug is free", async () => {
    const suffixes = ["abc123", "abc123", "def456"];
    service = new InstructorService(storage, indexClient, () => suffixes.shift() ?? "zzzzzz");

    await service.create("a@one.edu", "One");
    const second = await service.create("a@two.edu", "Two");
    const third = await service.create("a@three.edu", "Three");

    expect(second.slug).toBe("aabc123");
    expect(third.slug).toBe("adef456");
  });

  it("persists nothing when the store cannot be created", async () => {
    indexClient.failNext("createIndex", 401, "Incorrect API key provided");

    await expect(service.create("b@school.edu", "B")).rejects.toBeInstanceOf(RemoteServiceError);
    expect(await service.findByEmail("b@school.edu")).toBeUndefined();
    expect(await service.listAll()).toEqual([]);
  });

  it("removes the new store when the row cannot be written", async () => {
    class FailingStorage extends MemStorage {
      async createInstructor(_data: InsertInstructor): Promise<Instructor> {
        throw new Error("connection terminated");
      }
    }
    service = new InstructorService(new FailingStorage(), indexClient);

    await expect(service.create("c@school.edu", "C")).rejects.toThrow("connection terminated");
    expect(indexClient.callsTo("deleteIndex")).toEqual([{ operation: "deleteIndex", args: ["vs_1"] }]);
    expect(indexClient.indexes.size).toBe(0);
  });

  it("looks up by email case-insensitively", async () => {
    const created = await service.create("Prof.Smith@School.EDU", "Prof Smith");

    expect(created.email).toBe("prof.smith@school.edu");
    expect(created.slug).toBe("profsmith");
    expect((await service.findByEmail("  PROF.SMITH@school.edu "))?.id).toBe(created.id);
  });

  it("finds by slug", async () => {
    const created = await service.create("d@school.edu", "D");
    expect((await service.findBySlug("d"))?.id).toBe(created.id);
    expect(await service.findBySlug("missing")).toBeUndefined();
  });

  it("rejects blank and duplicate emails before touching the remote service", async () => {
    await expect(service.create("   ", "Name")).rejects.toBeInstanceOf(ValidationError);
    await expect(service.create("no-at-sign", "Name")).rejects.toBeInstanceOf(ValidationError);
    await expect(service.create("e@school.edu", "  ")).rejects.toThrow("Name is required");

    await service.create("e@school.edu", "E");
    await expect(service.create("E@School.edu", "E again")).rejects.toThrow("already exists");
    expect(indexClient.callsTo("createIndex")).toHaveLength(1);
  });

  it("lists instructors newest first", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-01-01T10:00:00Z"));
    await service.create("first@school.edu", "First");
    vi.setSystemTime(new Date("2025-01-02T10:00:00Z"));
    await service.create("second@school.edu", "Second");

    const all = await service.listAll();
    expect(all.map((instructor) => instructor.slug)).toEqual(["second", "first"]);
  });

  it("refreshes updatedAt when the profile changes", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-03-01T09:00:00Z"));
    const created = await service.create("f@school.edu", "F");
    vi.setSystemTime(new Date("2025-03-05T09:00:00Z"));

    const updated = await service.updateProfile(created.id, { presentationHtml: "<p>Office hours: Tue</p>" });

    expect(updated.updatedAt.toISOString()).toBe("2025-03-05T09:00:00.000Z");
    expect(updated.createdAt.toISOString()).toBe("2025-03-01T09:00:00.000Z");
    expect(updated.vectorStoreId).toBe(created.vectorStoreId);
    expect(service.presentationFor(updated)).toBe("<p>Office hours: Tue</p>");
  });

  it("generates a default presentation when none is set", async () => {
    const created = await service.create("g@school.edu", "Dr. <Grace>");
    expect(service.presentationFor(created)).toBe(defaultPresentationHtml(created));
    expect(service.presentationFor(created)).toContain("<h2>Welcome to Dr. &lt;Grace&gt;'s course assistant</h2>");
  });
});
