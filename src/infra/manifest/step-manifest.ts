import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ManifestError } from "../../core/errors";

export const STEP_MANIFEST_FILE = "step.yml";

export type StepInputDefinition = {
  name: string;
  title: string;
  summary: string;
  isRequired: boolean;
  isSensitive: boolean;
  isExpand: boolean;
  defaultValue: string | undefined;
  valueOptions: string[];
};

export type StepManifest = {
  title: string;
  summary: string;
  projectTypeTags: string[];
  inputs: StepInputDefinition[];
};

const inputOptsSchema = z.object({
  title: z.string().optional(),
  summary: z.string().optional(),
  is_required: z.boolean().optional(),
  is_sensitive: z.boolean().optional(),
  is_expand: z.boolean().optional(),
  value_options: z
    .array(z.union([z.string(), z.number(), z.boolean()]))
    .optional(),
});

const manifestSchema = z.object({
  title: z.string(),
  summary: z.string().optional(),
  project_type_tags: z.array(z.string()).optional(),
  inputs: z.array(z.record(z.unknown())),
});

function parseInputEntry(
  entry: Record<string, unknown>,
  index: number
): StepInputDefinition {
  const names = Object.keys(entry).filter((key) => key !== "opts");
  if (names.length !== 1) {
    throw new ManifestError(
      `Input #${index + 1} must declare exactly one name, found ${names.length}`
    );
  }
  const [name] = names;
  const rawDefault = entry[name];
  if (
    rawDefault !== null &&
    rawDefault !== undefined &&
    typeof rawDefault !== "string"
  ) {
    throw new ManifestError(`Input ${name} must have a string default value`);
  }

  const opts = inputOptsSchema.safeParse(entry.opts ?? {});
  if (!opts.success) {
    throw new ManifestError(
      `Input ${name} has invalid opts: ${opts.error.message}`
    );
  }

  return {
    name,
    title: opts.data.title ?? name,
    summary: opts.data.summary?.trim() ?? "",
    isRequired: opts.data.is_required ?? false,
    isSensitive: opts.data.is_sensitive ?? false,
    isExpand: opts.data.is_expand ?? false,
    defaultValue:
      typeof rawDefault === "string" && rawDefault !== ""
        ? rawDefault
        : undefined,
    valueOptions: (opts.data.value_options ?? []).map(String),
  };
}

export function parseStepManifest(raw: string): StepManifest {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ManifestError(`Invalid ${STEP_MANIFEST_FILE}: ${message}`);
  }

  const manifest = manifestSchema.safeParse(parsed);
  if (!manifest.success) {
    throw new ManifestError(
      `Invalid ${STEP_MANIFEST_FILE}: ${manifest.error.message}`
    );
  }

  return {
    title: manifest.data.title.trim(),
    summary: manifest.data.summary?.trim() ?? "",
    projectTypeTags: manifest.data.project_type_tags ?? [],
    inputs: manifest.data.inputs.map(parseInputEntry),
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Looks for `step.yml` in `startDir` and up to four of its parents, so the
 * manifest is found from `src/` as well as from the bundled `dist/`.
 */
export async function findStepManifest(
  startDir: string = path.dirname(fileURLToPath(import.meta.url))
): Promise<string | null> {
  let dir = path.resolve(startDir);
  for (let depth = 0; depth <= 4; depth += 1) {
    const candidate = path.join(dir, STEP_MANIFEST_FILE);
    if (await fileExists(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export async function loadStepManifest(
  manifestPath?: string
): Promise<StepManifest> {
  const resolved = manifestPath ?? (await findStepManifest());
  if (!resolved) {
    throw new ManifestError(`Cannot locate ${STEP_MANIFEST_FILE}`);
  }
  const raw = await fs.readFile(resolved, "utf8");
  return parseStepManifest(raw);
}
