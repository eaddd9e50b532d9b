import { z } from 'zod';
import type { ToolDefinition } from '../types.js';
import type { ProjectIndex } from './projectIndex.js';
import { PROJECT_OVERVIEW_MEMORY } from './localProjectIndex.js';

/** Name of the mandatory preflight tool */
export const ACTIVATION_TOOL = 'activate_project';

/** Name of the tool forced once right after activation */
export const OVERVIEW_TOOL = 'read_project_overview';

const nonBlank = z.string().refine((s) => s.trim() !== '', 'must be a non-empty string');
const lineCount = z.number().int().nonnegative().nullable().optional().transform((v) => v ?? undefined);

/** Argument schemas per tool; unknown keys are dropped */
const TOOL_ARGUMENTS = {
  activate_project: z.object({
    project: z.string().nullable().optional().transform((v) => v ?? '.'),
  }),
  list_memories: z.object({}),
  read_project_overview: z.object({}),
  read_memory: z.object({ name: nonBlank }),
  list_dir: z.object({ path: nonBlank }),
  read_file: z.object({ path: nonBlank, head: lineCount, tail: lineCount }),
  search_for_pattern: z.object({
    pattern: nonBlank,
    path: z.string().nullable().optional().transform((v) => v ?? undefined),
  }),
} as const;

export type ToolName = keyof typeof TOOL_ARGUMENTS;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_ARGUMENTS, name);
}

/** OpenAI-compatible function definitions for the read-only tool surface */
export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: ACTIVATION_TOOL,
    description:
      "Activate the current project (required preflight). Call with project='.' to activate the project root.",
    parameters: {
      type: 'object',
      properties: {
        project: { type: 'string', description: "Must be '.' or the absolute path to the project root." },
      },
      required: ['project'],
    },
  },
  {
    name: 'list_memories',
    description: 'List the project memories (Markdown notes kept by the project maintainers).',
    parameters: { type: 'object', properties: {}, required: [] },
  },
  {
    name: OVERVIEW_TOOL,
    description: `Read the project memory '${PROJECT_OVERVIEW_MEMORY}' (if present).`,
    parameters: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'read_memory',
    description: 'Read a project memory by name (no path separators).',
    parameters: {
      type: 'object',
      properties: { name: { type: 'string', description: 'Memory name (with or without .md).' } },
      required: ['name'],
    },
  },
  {
    name: 'list_dir',
    description: 'List files and directories under a project-relative path (read-only).',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: "Project-relative path. Use '.' for the project root." },
      },
      required: ['path'],
    },
  },
  {
    name: 'read_file',
    description: 'Read a text file under the project root (read-only).',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Project-relative file path.' },
        head: { type: 'integer', description: 'Optional: read only the first N lines.' },
        tail: { type: 'integer', description: 'Optional: read only the last N lines.' },
      },
      required: ['path'],
    },
  },
  {
    name: 'search_for_pattern',
    description: 'Search project files for a literal substring (read-only).',
    parameters: {
      type: 'object',
      properties: {
        pattern: { type: 'string', description: 'Literal substring to search for.' },
        path: {
          type: 'string',
          description: 'Optional project-relative directory, file, or glob restricting the search.',
        },
      },
      required: ['pattern'],
    },
  },
];

/** Parsed tool arguments, or the reason they could not be parsed */
export type ParsedArguments =
  | { readonly ok: true; readonly args: Readonly<Record<string, unknown>> }
  | { readonly ok: false; readonly args: Readonly<Record<string, unknown>>; readonly error: string };

/**
 * Decode the model's raw JSON argument string.
 * An empty string means no arguments.
 */
export function parseToolArguments(raw: string): ParsedArguments {
  if (raw.trim() === '') return { ok: true, args: {} };
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    return { ok: false, args: {}, error: `Invalid tool arguments JSON: ${String(err)}` };
  }
  const record = z.record(z.unknown()).safeParse(decoded);
  if (!record.success) {
    return { ok: false, args: {}, error: 'Tool arguments must be a JSON object' };
  }
  return { ok: true, args: record.data };
}

/**
 * Validate `args` for tool `name` and run it against the index.
 * Rejects with an Error for invalid arguments; index failures propagate unchanged.
 */
export async function executeTool(
  index: ProjectIndex,
  name: ToolName,
  args: Readonly<Record<string, unknown>>,
): Promise<unknown> {
  switch (name) {
    case 'activate_project': {
      const a = parseArgs(TOOL_ARGUMENTS.activate_project, name, args);
      return index.activateProject(a.project);
    }
    case 'list_memories':
      return index.listMemories();
    case 'read_project_overview':
      return index.readMemory(PROJECT_OVERVIEW_MEMORY);
    case 'read_memory': {
      const a = parseArgs(TOOL_ARGUMENTS.read_memory, name, args);
      return index.readMemory(a.name);
    }
    case 'list_dir': {
      const a = parseArgs(TOOL_ARGUMENTS.list_dir, name, args);
      return index.listDirectory(a.path);
    }
    case 'read_file': {
      const a = parseArgs(TOOL_ARGUMENTS.read_file, name, args);
      return index.readFile(a.path, { head: a.head, tail: a.tail });
    }
    case 'search_for_pattern': {
      const a = parseArgs(TOOL_ARGUMENTS.search_for_pattern, name, args);
      return index.searchPattern(a.pattern, a.path);
    }
  }
}

function parseArgs<S extends z.ZodTypeAny>(
  schema: S,
  name: ToolName,
  args: Readonly<Record<string, unknown>>,
): z.output<S> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'arguments';
    throw new Error(`Invalid arguments for ${name}: ${field} ${issue?.message ?? 'is invalid'}`);
  }
  return result.data;
}
