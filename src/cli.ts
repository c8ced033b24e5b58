// src/cli.ts
// Command-line front end for the client.

/*
Usage:

  docsearch whoami
  docsearch projects
  docsearch upload <projectId> <path> [--no-wait] [--reference-id id] [--poll-interval ms] [--poll-timeout ms]
  docsearch status <projectId> <fileId>
  docsearch wait <projectId> <fileId> [--poll-interval ms] [--poll-timeout ms]
  docsearch delete <projectId> <fileId>
  docsearch search "<query>" [--project id] [--file id]... [--top-k n] [--min-score x]
                   [--reference-id id]... [--page n]... [--page-from n] [--page-to n]
                   [--category c] [--document-type t]

Global flags: --base-url url, --routes organization|sdk
*/

import { DocSearchClient, DocSearchClientOptions } from './client';
import { RouteProfileName } from './config';
import { ValidationError } from './errors';
import { MetadataFilters } from './models/filters.model';
import { SearchOptions } from './services/search.service';
import { UploadOptions, WaitOptions } from './services/upload.service';

export const USAGE = 'Usage: docsearch <whoami|projects|upload|status|wait|delete|search> [args] [--flags]';

const BOOLEAN_FLAGS = new Set(['no-wait', 'help']);

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Map<string, string[]>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string[]>();
  const push = (name: string, value: string) => flags.set(name, [...(flags.get(name) ?? []), value]);

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) {
      positionals.push(a);
      continue;
    }
    const eq = a.indexOf('=');
    const name = eq === -1 ? a.slice(2) : a.slice(2, eq);
    if (eq !== -1) {
      if (BOOLEAN_FLAGS.has(name)) throw new ValidationError(`Flag --${name} takes no value`);
      push(name, a.slice(eq + 1));
    } else if (BOOLEAN_FLAGS.has(name)) push(name, 'true');
    else {
      const value = argv[++i];
      if (value === undefined) throw new ValidationError(`Flag --${name} needs a value`);
      push(name, value);
    }
  }

  const [command = 'help', ...rest] = positionals;
  return { command, positionals: rest, flags };
}

const isRouteProfile = (value: string): value is RouteProfileName => value === 'organization' || value === 'sdk';

const last = (args: ParsedArgs, name: string): string | undefined => args.flags.get(name)?.at(-1);

const all = (args: ParsedArgs, name: string): string[] => args.flags.get(name) ?? [];

const numberFlag = (args: ParsedArgs, name: string): number | undefined => {
  const raw = last(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ValidationError(`Flag --${name} expects a number, got '${raw}'`);
  }
  return value;
};

const toPage = (raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new ValidationError(`Page numbers must be integers, got '${raw}'`);
  return value;
};

const requirePositionals = (args: ParsedArgs, names: string[]): string[] => {
  if (args.positionals.length < names.length) {
    throw new ValidationError(`${args.command} expects ${names.map((n) => `<${n}>`).join(' ')}`);
  }
  return args.positionals.slice(0, names.length);
};

export function waitOptionsFrom(args: ParsedArgs): WaitOptions {
  return {
    pollIntervalMs: numberFlag(args, 'poll-interval'),
    pollTimeoutMs: numberFlag(args, 'poll-timeout'),
  };
}

export function filtersFrom(args: ParsedArgs): MetadataFilters | undefined {
  const filters: MetadataFilters = {};
  const referenceIds = all(args, 'reference-id');
  if (referenceIds.length === 1) filters.referenceId = referenceIds[0];
  else if (referenceIds.length > 1) filters.referenceIds = referenceIds;

  const pages = all(args, 'page').map(toPage);
  if (pages.length === 1) filters.pageNumber = pages[0];
  else if (pages.length > 1) filters.pageNumbers = pages;

  const from = last(args, 'page-from');
  const to = last(args, 'page-to');
  if (from !== undefined || to !== undefined) {
    filters.pageRange = {};
    if (from !== undefined) filters.pageRange.gte = toPage(from);
    if (to !== undefined) filters.pageRange.lte = toPage(to);
  }

  const category = last(args, 'category');
  if (category) filters.category = category;
  const documentType = last(args, 'document-type');
  if (documentType) filters.documentType = documentType;

  return Object.keys(filters).length > 0 ? filters : undefined;
}

export function searchOptionsFrom(args: ParsedArgs): SearchOptions {
  const fileIds = all(args, 'file');
  return {
    projectId: last(args, 'project'),
    fileIds: fileIds.length > 0 ? fileIds : undefined,
    topK: numberFlag(args, 'top-k'),
    minScore: numberFlag(args, 'min-score'),
    filters: filtersFrom(args),
  };
}

export interface CliIO {
  createClient: (options: DocSearchClientOptions) => DocSearchClient;
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIO: CliIO = {
  createClient: (options) => new DocSearchClient(options),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

async function dispatch(args: ParsedArgs, client: DocSearchClient): Promise<unknown> {
  switch (args.command) {
    case 'whoami':
      return client.getContext();
    case 'projects':
      return client.listProjects();
    case 'upload': {
      const [projectId, filePath] = requirePositionals(args, ['projectId', 'path']);
      const options: UploadOptions = {
        ...waitOptionsFrom(args),
        waitForReady: !args.flags.has('no-wait'),
        referenceId: last(args, 'reference-id'),
      };
      return client.uploadFile(projectId, filePath, options);
    }
    case 'status': {
      const [projectId, fileId] = requirePositionals(args, ['projectId', 'fileId']);
      return client.getFileStatus(projectId, fileId);
    }
    case 'wait': {
      const [projectId, fileId] = requirePositionals(args, ['projectId', 'fileId']);
      return client.waitForReady(projectId, fileId, waitOptionsFrom(args));
    }
    case 'delete': {
      const [projectId, fileId] = requirePositionals(args, ['projectId', 'fileId']);
      await client.deleteFile(projectId, fileId);
      return { deleted: fileId };
    }
    case 'search': {
      const query = args.positionals.join(' ').trim();
      if (!query) throw new ValidationError('search expects a query');
      return client.search(query, searchOptionsFrom(args));
    }
    default:
      throw new ValidationError(`Unknown command '${args.command}'. ${USAGE}`);
  }
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.command === 'help' || args.flags.has('help')) {
      io.out(USAGE);
      return 0;
    }
    let routes: RouteProfileName | undefined;
    const routesFlag = last(args, 'routes');
    if (routesFlag !== undefined) {
      if (!isRouteProfile(routesFlag)) {
        throw new ValidationError(`--routes must be 'organization' or 'sdk', got '${routesFlag}'`);
      }
      routes = routesFlag;
    }
    const client = io.createClient({ baseUrl: last(args, 'base-url'), routes });
    const result = await dispatch(args, client);
    io.out(JSON.stringify(result, null, 2));
    return 0;
  } catch (error: unknown) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
