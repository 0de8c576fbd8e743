/**
 * CLI command handling.
 *
 * runCommand dispatches one command against the stores and returns the exit
 * code. Output goes through the context's writers so tests can capture it.
 * Store errors are reported as `error [Kind]: message` with exit code 1; any
 * other error propagates to the caller.
 */

import fs from "node:fs";
import { isStoreError } from "./store/errors.js";
import { decodeIdentifier } from "./store/identifiers.js";
import { assetKindForPath } from "./store/media-types.js";
import type { NoteTreeNode } from "./store/notes.js";
import type { Stores } from "./stores.js";

export interface CommandContext {
  stores: Stores;
  out(line: string): void;
  err(line: string): void;
}

export const USAGE = `Usage: notekeep [--config <file>] [--verbose] <command>

Commands:
  tenants                                  List configured tenants and their roots
  tree <tenant>                            Show the tenant's note tree
  ls <tenant> [dir] [--images]             List a directory (notes, or images with --images)
  cat <tenant> <path>                      Print a note
  write <tenant> <path> <text> [--strict]  Create or replace a note
  write <tenant> <path> --file <f>         ... with content read from a file
  put-image <tenant> <path> <file>         Store an image (jpg, jpeg, png, gif)
  rm <tenant> <path>                       Delete a note or image
  mv <tenant> <path> <new-name>            Rename a note within its directory
  decode <uri>                             Show the kind and path behind a note:/// or img:/// URI
  help                                     Show this help`;

/** Options that take a value; everything else starting with -- is a boolean flag. */
const VALUE_OPTIONS = new Set(["--config", "--file"]);

export interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
  options: Map<string, string>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const options = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[i + 1];
      if (value !== undefined) options.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      flags.add(arg);
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, flags, options };
}

function renderTree(nodes: NoteTreeNode[], depth: number, out: (line: string) => void): void {
  const indent = "  ".repeat(depth);
  for (const node of nodes) {
    if (node.type === "directory") {
      out(`${indent}${node.name}/`);
      renderTree(node.children ?? [], depth + 1, out);
    } else {
      out(`${indent}${node.name}`);
    }
  }
}

export function runCommand(argv: readonly string[], ctx: CommandContext): number {
  const { positionals, flags, options } = parseArgs(argv);
  const command: string | undefined = positionals[0];
  const args = positionals.slice(1);
  const { notes, assets, registry } = ctx.stores;

  const usageError = (usage: string): number => {
    ctx.err(`usage: notekeep ${usage}`);
    return 2;
  };

  try {
    switch (command) {
      case undefined:
      case "help":
        ctx.out(USAGE);
        return 0;

      case "tenants":
        for (const tenantId of registry.tenantIds()) {
          ctx.out(`${tenantId}\t${registry.resolveTenantRoot(tenantId)}`);
        }
        return 0;

      case "tree": {
        const [tenantId] = args;
        if (!tenantId) return usageError("tree <tenant>");
        renderTree(notes.tree(tenantId), 0, ctx.out);
        return 0;
      }

      case "ls": {
        const [tenantId, dir = ""] = args;
        if (!tenantId) return usageError("ls <tenant> [dir] [--images]");
        const entries = flags.has("--images") ? assets.list(tenantId, dir) : notes.list(tenantId, dir);
        for (const entry of entries) {
          ctx.out(entry.kind === "directory" ? `${entry.name}/` : entry.name);
        }
        return 0;
      }

      case "cat": {
        const [tenantId, notePath] = args;
        if (!tenantId || !notePath) return usageError("cat <tenant> <path>");
        ctx.out(notes.read(tenantId, notePath));
        return 0;
      }

      case "write": {
        const [tenantId, notePath, text] = args;
        const file = options.get("--file");
        if (!tenantId || !notePath || (text === undefined && file === undefined)) {
          return usageError("write <tenant> <path> (<text> | --file <f>) [--strict]");
        }
        const content = file !== undefined ? fs.readFileSync(file) : text;
        const result = notes.write(tenantId, notePath, content, { strict: flags.has("--strict") });
        ctx.out(`${result.created ? "created" : "updated"} ${result.uri} (${result.bytes} bytes)`);
        return 0;
      }

      case "put-image": {
        const [tenantId, assetPath, file] = args;
        if (!tenantId || !assetPath || !file) return usageError("put-image <tenant> <path> <file>");
        const result = assets.write(tenantId, assetPath, fs.readFileSync(file), { strict: flags.has("--strict") });
        ctx.out(`${result.created ? "stored" : "replaced"} ${result.uri} (${result.mimeType}, ${result.bytes} bytes)`);
        return 0;
      }

      case "rm": {
        const [tenantId, entryPath] = args;
        if (!tenantId || !entryPath) return usageError("rm <tenant> <path>");
        if (assetKindForPath(entryPath)) {
          assets.delete(tenantId, entryPath);
        } else {
          notes.delete(tenantId, entryPath);
        }
        ctx.out(`deleted ${entryPath}`);
        return 0;
      }

      case "mv": {
        const [tenantId, notePath, newName] = args;
        if (!tenantId || !notePath || !newName) return usageError("mv <tenant> <path> <new-name>");
        const result = notes.rename(tenantId, notePath, newName);
        ctx.out(`renamed ${result.previousPath} -> ${result.path}`);
        return 0;
      }

      case "decode": {
        const [uri] = args;
        if (!uri) return usageError("decode <uri>");
        const decoded = decodeIdentifier(uri);
        ctx.out(`${decoded.kind}\t${decoded.logicalPath}`);
        return 0;
      }

      default:
        ctx.err(`Unknown command: ${command}`);
        ctx.err(USAGE);
        return 2;
    }
  } catch (error) {
    if (isStoreError(error)) {
      ctx.err(`error [${error.kind}]: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
