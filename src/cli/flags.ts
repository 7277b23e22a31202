import { parseArgs } from "node:util";
import type { ParseArgsConfig } from "node:util";
import { FlagError, errorMessage } from "../lib/errors.ts";

type FlagValue = string | number | boolean | string[];

interface FlagDefinition {
  name: string;
  kind: "string" | "int" | "bool" | "list";
  description: string;
  defaultValue: FlagValue;
}

/**
 * Command-line flags shared by the core and every registered munger.
 *
 * Each declaration returns a getter. Getters return the default until
 * `parse()` has run. Boolean flags also accept a `--no-<name>` form.
 */
export interface FlagSet {
  string(name: string, defaultValue: string, description: string): () => string;
  int(name: string, defaultValue: number, description: string): () => number;
  bool(name: string, defaultValue: boolean, description: string): () => boolean;
  stringList(name: string, defaultValue: string[], description: string): () => string[];
  /** Parse argv (without the node and script entries). Returns whether --help was given. */
  parse(argv: string[]): { help: boolean };
  /** True when the flag appeared on the command line. */
  isSet(name: string): boolean;
  usage(): string;
}

export function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function createFlagSet(): FlagSet {
  const definitions = new Map<string, FlagDefinition>();
  const parsed = new Map<string, FlagValue>();

  function define<T extends FlagValue>(
    name: string,
    kind: FlagDefinition["kind"],
    defaultValue: T,
    description: string,
    narrow: (value: FlagValue | undefined) => T | undefined,
  ): () => T {
    if (name === "help" || definitions.has(name)) {
      throw new FlagError(`flag redefined: ${name}`);
    }
    definitions.set(name, { name, kind, description, defaultValue });
    return () => narrow(parsed.get(name)) ?? defaultValue;
  }

  function convert(definition: FlagDefinition, raw: string): FlagValue {
    switch (definition.kind) {
      case "int": {
        const value = Number(raw);
        if (raw.trim() === "" || !Number.isInteger(value)) {
          throw new FlagError(`invalid value "${raw}" for --${definition.name}: expected an integer`);
        }
        return value;
      }
      case "list":
        return splitList(raw);
      default:
        return raw;
    }
  }

  return {
    string: (name, defaultValue, description) =>
      define(name, "string", defaultValue, description, (v) => (typeof v === "string" ? v : undefined)),
    int: (name, defaultValue, description) =>
      define(name, "int", defaultValue, description, (v) => (typeof v === "number" ? v : undefined)),
    bool: (name, defaultValue, description) =>
      define(name, "bool", defaultValue, description, (v) => (typeof v === "boolean" ? v : undefined)),
    stringList: (name, defaultValue, description) =>
      define(name, "list", defaultValue, description, (v) => (Array.isArray(v) ? v : undefined)),

    parse(argv: string[]): { help: boolean } {
      const options: NonNullable<ParseArgsConfig["options"]> = {
        help: { type: "boolean", short: "h" },
      };
      for (const definition of definitions.values()) {
        if (definition.kind === "bool") {
          options[definition.name] = { type: "boolean" };
          options[`no-${definition.name}`] = { type: "boolean" };
        } else {
          options[definition.name] = { type: "string" };
        }
      }

      let values: Record<string, string | boolean | Array<string | boolean> | undefined>;
      try {
        values = parseArgs({ args: argv, options, strict: true, allowPositionals: false }).values;
      } catch (err) {
        throw new FlagError(errorMessage(err));
      }

      parsed.clear();
      for (const definition of definitions.values()) {
        if (definition.kind === "bool") {
          if (values[definition.name] === true) parsed.set(definition.name, true);
          if (values[`no-${definition.name}`] === true) parsed.set(definition.name, false);
          continue;
        }
        const raw = values[definition.name];
        if (typeof raw === "string") {
          parsed.set(definition.name, convert(definition, raw));
        }
      }

      return { help: values.help === true };
    },

    isSet(name: string): boolean {
      return parsed.has(name);
    },

    usage(): string {
      const lines = ["Usage: pr-munger [flags]", "", "Flags:"];
      const sorted = [...definitions.values()].sort((a, b) => a.name.localeCompare(b.name));
      for (const definition of sorted) {
        const shown = Array.isArray(definition.defaultValue)
          ? definition.defaultValue.join(",")
          : String(definition.defaultValue);
        lines.push(`  --${definition.name}  ${definition.description} (default: ${shown})`);
      }
      lines.push("  -h, --help  Show this help");
      return lines.join("\n");
    },
  };
}
