import { describe, it, expect } from "vitest";
import { ConfigStore } from "./config-store.js";
import { createMemoryDocumentBackend, type DocumentBackend } from "./document-backend.js";
import { PersistenceError, ScopeLockedError } from "../errors.js";

function failingBackend(initial: Record<string, { featureX: boolean }>): DocumentBackend {
  const inner = createMemoryDocumentBackend(initial);
  return {
    read: (scope) => inner.read(scope),
    write: async () => {
      throw new Error("ENOSPC: no space left on device");
    }
  };
}

describe("ConfigStore", () => {
  it("hands out a working copy distinct from the committed document", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend({ prod: { featureX: false } }));

    const copy = await store.loadWorkingCopy("prod");
    copy.featureX = true;

    expect(await store.load("prod")).toEqual({ featureX: false });
    expect(store.workingCopy("prod")).toBe(copy);
  });

  it("starts from an empty document for unknown scopes", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend());

    expect(await store.loadWorkingCopy("new")).toEqual({});
  });

  it("refuses a second working copy for the same scope until the first is released", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend({ prod: { featureX: false } }));

    await store.loadWorkingCopy("prod");

    await expect(store.loadWorkingCopy("prod")).rejects.toBeInstanceOf(ScopeLockedError);
    await expect(store.loadWorkingCopy("prod")).rejects.toThrow(
      'Configuration scope "prod" is being edited by another transaction'
    );

    store.discard("prod");
    await expect(store.loadWorkingCopy("prod")).resolves.toEqual({ featureX: false });
  });

  it("locks scopes independently", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend());

    await store.loadWorkingCopy("prod");

    await expect(store.loadWorkingCopy("staging")).resolves.toEqual({});
    expect(store.isLocked("prod")).toBe(true);
    expect(store.isLocked("staging")).toBe(true);
    expect(store.isLocked("dev")).toBe(false);
  });

  it("counts a working copy that is still loading as locked", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend());

    const first = store.loadWorkingCopy("prod");

    await expect(store.loadWorkingCopy("prod")).rejects.toBeInstanceOf(ScopeLockedError);
    await first;
  });

  it("commits the working copy and releases the scope", async () => {
    const backend = createMemoryDocumentBackend({ prod: { featureX: false } });
    const store = new ConfigStore(backend);

    const copy = await store.loadWorkingCopy("prod");
    copy.featureX = true;
    await store.commit("prod");

    expect(await store.load("prod")).toEqual({ featureX: true });
    expect(backend.documents.get("prod")).toEqual({ featureX: true });
    expect(store.isLocked("prod")).toBe(false);
  });

  it("detaches the committed document from later edits to the old working copy", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend());

    const copy = await store.loadWorkingCopy("prod");
    copy.value = 1;
    await store.commit("prod");
    copy.value = 2;

    expect(await store.load("prod")).toEqual({ value: 1 });
  });

  it("leaves the committed document unchanged when the write fails", async () => {
    const store = new ConfigStore(failingBackend({ prod: { featureX: false } }));

    const copy = await store.loadWorkingCopy("prod");
    copy.featureX = true;

    const error = await store.commit("prod").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({
      scope: "prod",
      message: 'Failed to save configuration for "prod": ENOSPC: no space left on device'
    });
    expect(await store.load("prod")).toEqual({ featureX: false });
    expect(store.isLocked("prod")).toBe(true);
  });

  it("discards without committing, and a second discard is a no-op", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend({ prod: { featureX: false } }));

    const copy = await store.loadWorkingCopy("prod");
    copy.featureX = true;

    store.discard("prod");
    expect(() => store.discard("prod")).not.toThrow();

    expect(store.isLocked("prod")).toBe(false);
    expect(await store.load("prod")).toEqual({ featureX: false });
  });

  it("replaces the working copy wholesale", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend({ prod: { a: 1 } }));

    await store.loadWorkingCopy("prod");
    store.replaceWorkingCopy("prod", { b: 2 });
    await store.commit("prod");

    expect(await store.load("prod")).toEqual({ b: 2 });
  });

  it("requires a held working copy to commit", async () => {
    const store = new ConfigStore(createMemoryDocumentBackend());

    await expect(store.commit("prod")).rejects.toThrow('No working copy is held for scope "prod"');
    expect(() => store.workingCopy("prod")).toThrow('No working copy is held for scope "prod"');
  });
});
