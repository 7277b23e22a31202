import { describe, it, expect, beforeEach, vi } from "vitest";
import { createMungerRegistry, type MungerRegistry } from "./registry.ts";
import { createFlagSet } from "../cli/flags.ts";
import {
  DuplicateMungerError,
  EachLoopError,
  MungerInitializeError,
  MungerNotFoundError,
  RegistryLifecycleError,
} from "../lib/errors.ts";
import {
  createFakeGitHubClient,
  createRecordingMunger,
  createSilentLogger,
  makeIssue,
  makePullRequest,
} from "../testing/fakes.ts";

describe("createMungerRegistry", () => {
  let log: string[];
  let registry: MungerRegistry;
  const client = createFakeGitHubClient();

  beforeEach(() => {
    log = [];
    registry = createMungerRegistry({ logger: createSilentLogger() });
  });

  describe("register", () => {
    it("rejects a second munger with the same name and keeps the first", () => {
      const first = createRecordingMunger("size", log);
      const second = createRecordingMunger("size", log);

      registry.register(first);
      expect(() => registry.register(second)).toThrow(DuplicateMungerError);
      expect(() => registry.register(second)).toThrow("a munger with that name (size) already exists");

      const all = registry.getAll();
      expect(all).toHaveLength(1);
      expect(all[0]).toBe(first);
    });

    it("returns every registered munger regardless of activation", async () => {
      registry.register(createRecordingMunger("a", log));
      registry.register(createRecordingMunger("b", log));
      registry.register(createRecordingMunger("c", log));

      await registry.activate(["b"], client);

      expect(registry.getAll().map((m) => m.name)).toEqual(["a", "b", "c"]);
      expect(registry.getActive().map((m) => m.name)).toEqual(["b"]);
    });

    it("refuses registration once activation has started", async () => {
      registry.register(createRecordingMunger("a", log));
      await registry.activate(["a"], client);

      expect(() => registry.register(createRecordingMunger("late", log))).toThrow(RegistryLifecycleError);
      expect(registry.getAll().map((m) => m.name)).toEqual(["a"]);
    });
  });

  describe("registerOrExit", () => {
    it("exits with code 1 on a duplicate name", () => {
      const exit = vi.fn((code: number): never => {
        throw new Error(`exit ${code}`);
      });
      const fatalRegistry = createMungerRegistry({ logger: createSilentLogger(), exit });

      fatalRegistry.registerOrExit(createRecordingMunger("size", log));
      expect(exit).not.toHaveBeenCalled();

      expect(() => fatalRegistry.registerOrExit(createRecordingMunger("size", log))).toThrow("exit 1");
      expect(exit).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(1);
    });
  });

  describe("addFlags", () => {
    it("lets every registered munger declare flags", () => {
      registry.register(createRecordingMunger("a", log));
      registry.register(createRecordingMunger("b", log));

      registry.addFlags(createFlagSet());

      expect(log).toEqual(["a:flags", "b:flags"]);
    });
  });

  describe("activate", () => {
    beforeEach(() => {
      registry.register(createRecordingMunger("a", log));
      registry.register(createRecordingMunger("b", log));
      registry.register(createRecordingMunger("c", log));
    });

    it("activates and initializes in request order", async () => {
      await registry.activate(["c", "a"], client);

      expect(registry.getActive().map((m) => m.name)).toEqual(["c", "a"]);
      expect(log).toEqual(["c:init", "a:init"]);
    });

    it("initializes nothing when a requested name is unknown", async () => {
      const result = registry.activate(["a", "missing", "b"], client);

      await expect(result).rejects.toBeInstanceOf(MungerNotFoundError);
      await expect(result).rejects.toThrow("couldn't find a munger named: missing");
      expect(log).toEqual([]);
      expect(registry.getActive()).toEqual([]);
    });

    it("rejects a name requested twice", async () => {
      await expect(registry.activate(["a", "a"], client)).rejects.toBeInstanceOf(DuplicateMungerError);
      expect(log).toEqual([]);
    });

    it("stops at the first initialize failure and leaves the partial active list", async () => {
      const failing = createMungerRegistry({ logger: createSilentLogger() });
      failing.register(createRecordingMunger("a", log));
      failing.register(
        createRecordingMunger("b", log, {
          initialize: async () => {
            throw new Error("missing label config");
          },
        }),
      );
      failing.register(createRecordingMunger("c", log));

      const error = await failing.activate(["a", "b", "c"], client).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MungerInitializeError);
      expect(error).toMatchObject({ mungerName: "b" });
      expect(failing.getActive().map((m) => m.name)).toEqual(["a", "b"]);
      expect(log).toEqual(["a:init"]);
    });

    it("cannot run twice", async () => {
      await registry.activate(["a"], client);
      await expect(registry.activate(["b"], client)).rejects.toBeInstanceOf(RegistryLifecycleError);
      expect(registry.getActive().map((m) => m.name)).toEqual(["a"]);
    });

    it("accepts an empty request", async () => {
      await registry.activate([], client);
      expect(registry.getActive()).toEqual([]);
    });
  });

  describe("runEachLoop", () => {
    it("runs every active hook in activation order", async () => {
      registry.register(createRecordingMunger("a", log));
      registry.register(createRecordingMunger("b", log));
      registry.register(createRecordingMunger("unused", log));
      await registry.activate(["b", "a"], client);
      log.length = 0;

      await registry.runEachLoop(client);

      expect(log).toEqual(["b:loop", "a:loop"]);
    });

    it("stops at the first failing hook", async () => {
      registry.register(createRecordingMunger("a", log));
      registry.register(
        createRecordingMunger("b", log, {
          eachLoop: async () => {
            throw new Error("rate limited");
          },
        }),
      );
      registry.register(createRecordingMunger("c", log));
      await registry.activate(["a", "b", "c"], client);
      log.length = 0;

      const error = await registry.runEachLoop(client).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EachLoopError);
      expect(error).toMatchObject({ mungerName: "b" });
      expect(log).toEqual(["a:loop"]);
    });
  });

  describe("mungeAll", () => {
    it("keeps going after a munger throws", async () => {
      registry.register(createRecordingMunger("a", log));
      registry.register(
        createRecordingMunger("b", log, {
          mungePullRequest: async () => {
            log.push("b:munge");
            throw new Error("label API down");
          },
        }),
      );
      registry.register(createRecordingMunger("c", log));
      await registry.activate(["a", "b", "c"], client);
      log.length = 0;

      await registry.mungeAll(client, {
        issue: makeIssue(),
        pr: makePullRequest(),
        commits: [],
        events: [],
      });

      expect(log).toEqual(["a:munge", "b:munge", "c:munge"]);
    });
  });
});
