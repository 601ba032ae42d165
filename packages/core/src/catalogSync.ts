import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  compareStringsByCodeUnit,
  hasErrorCode,
  toErrorMessage,
  toRecord,
  type EngineLogger,
  type WorkflowCatalogStore,
  type WorkflowDefinition,
} from '@runwright/shared';
import { MAX_TURNS_LIMIT } from './runLifecycle.js';

export const WORKFLOW_PROMPT_FILE = 'prompt.md';
export const WORKFLOW_CONFIG_FILE = 'config.json';
export const WORKFLOW_TOOLS_FILE = 'allowed_tools.json';

const WORKFLOW_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export type CatalogDiscoveryError = {
  name: string | null;
  path: string;
  message: string;
};

export type DiscoveredWorkflows = {
  workflows: WorkflowDefinition[];
  errors: CatalogDiscoveryError[];
};

export type CatalogSyncReport = {
  discovered: number;
  registered: string[];
  updated: string[];
  unchanged: string[];
  errors: CatalogDiscoveryError[];
};

export type WorkflowCatalogSyncOptions = {
  root: string;
  now?: () => Date;
  logger?: EngineLogger;
};

type WorkflowConfig = {
  displayName: string | null;
  description: string | null;
  allowedTools: string[] | null;
  suggestedMaxTurns: number | null;
};

class WorkflowSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowSourceError';
  }
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }

    throw error;
  }
}

function parseJsonFile(fileName: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new WorkflowSourceError(`${fileName} is not valid JSON: ${toErrorMessage(error)}`);
  }
}

function parseToolList(fileName: string, field: string, value: unknown): string[] {
  if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) {
    throw new WorkflowSourceError(`${fileName} ${field} must be an array of strings.`);
  }

  const tools: string[] = [];
  for (const item of value) {
    const tool = String(item).trim();
    if (tool.length > 0 && !tools.includes(tool)) {
      tools.push(tool);
    }
  }
  return tools;
}

function parseOptionalText(field: string, value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value !== 'string') {
    throw new WorkflowSourceError(`${WORKFLOW_CONFIG_FILE} "${field}" must be a string.`);
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseWorkflowConfig(content: string): WorkflowConfig {
  const config = toRecord(parseJsonFile(WORKFLOW_CONFIG_FILE, content));
  if (!config) {
    throw new WorkflowSourceError(`${WORKFLOW_CONFIG_FILE} must contain a JSON object.`);
  }

  const maxTurns = config.suggested_max_turns;
  if (
    maxTurns !== undefined &&
    maxTurns !== null &&
    (typeof maxTurns !== 'number' || !Number.isInteger(maxTurns) || maxTurns < 1 || maxTurns > MAX_TURNS_LIMIT)
  ) {
    throw new WorkflowSourceError(
      `${WORKFLOW_CONFIG_FILE} "suggested_max_turns" must be an integer between 1 and ${MAX_TURNS_LIMIT}.`,
    );
  }

  return {
    displayName: parseOptionalText('display_name', config.display_name),
    description: parseOptionalText('description', config.description),
    allowedTools: config.allowed_tools === undefined
      ? null
      : parseToolList(WORKFLOW_CONFIG_FILE, '"allowed_tools"', config.allowed_tools),
    suggestedMaxTurns: typeof maxTurns === 'number' ? maxTurns : null,
  };
}

/** `fix_tests` -> `Fix Tests`. */
export function toDisplayName(name: string): string {
  return name
    .split(/[_-]+/)
    .filter(part => part.length > 0)
    .map(part => `${part.charAt(0).toUpperCase()}${part.slice(1)}`)
    .join(' ');
}

function firstPromptLine(promptTemplate: string): string | null {
  for (const line of promptTemplate.split('\n')) {
    const text = line.replace(/^#+\s*/, '').trim();
    if (text.length > 0) {
      return text;
    }
  }
  return null;
}

export function computeWorkflowContentHash(definition: Omit<WorkflowDefinition, 'contentHash'>): string {
  const normalized = JSON.stringify({
    name: definition.name,
    displayName: definition.displayName,
    description: definition.description,
    promptTemplate: definition.promptTemplate,
    allowedTools: definition.allowedTools,
    suggestedMaxTurns: definition.suggestedMaxTurns,
    sourcePath: definition.sourcePath,
  });
  return createHash('sha256').update(normalized).digest('hex');
}

/**
 * Loads workflow definitions from `<root>/<name>/` directories into the
 * catalog. Sync only ever adds or updates; definitions whose directory has
 * gone stay registered.
 */
export class WorkflowCatalogSync {
  private readonly store: WorkflowCatalogStore;
  private readonly root: string;
  private readonly now: () => Date;
  private readonly logger: EngineLogger;

  constructor(store: WorkflowCatalogStore, options: WorkflowCatalogSyncOptions) {
    this.store = store;
    this.root = resolve(options.root);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
  }

  async discover(): Promise<DiscoveredWorkflows> {
    const directories = await this.listWorkflowDirectories();
    if (directories === null) {
      return {
        workflows: [],
        errors: [{ name: null, path: this.root, message: `Workflow directory ${this.root} does not exist.` }],
      };
    }

    const workflows: WorkflowDefinition[] = [];
    const errors: CatalogDiscoveryError[] = [];
    for (const name of directories) {
      const path = join(this.root, name);
      if (!WORKFLOW_NAME_PATTERN.test(name)) {
        errors.push({ name, path, message: `Workflow directory name "${name}" must match [A-Za-z0-9_-]+.` });
        continue;
      }

      try {
        workflows.push(await this.loadWorkflow(name, path));
      } catch (error) {
        if (!(error instanceof WorkflowSourceError)) {
          throw error;
        }

        errors.push({ name, path, message: error.message });
      }
    }

    return { workflows, errors };
  }

  async sync(): Promise<CatalogSyncReport> {
    const { workflows, errors } = await this.discover();
    const report: CatalogSyncReport = {
      discovered: workflows.length,
      registered: [],
      updated: [],
      unchanged: [],
      errors,
    };
    const occurredAt = this.now().toISOString();

    for (const workflow of workflows) {
      const existing = await this.store.getWorkflow(workflow.name);
      if (!existing) {
        await this.store.insertWorkflow(workflow, occurredAt);
        report.registered.push(workflow.name);
      } else if (existing.contentHash !== workflow.contentHash) {
        await this.store.updateWorkflow(workflow, occurredAt);
        report.updated.push(workflow.name);
      } else {
        report.unchanged.push(workflow.name);
      }
    }

    for (const error of errors) {
      this.logger.warn(`Workflow catalog skipped ${error.path}: ${error.message}`);
    }
    this.logger.info(
      `Workflow catalog sync: discovered=${report.discovered} registered=${report.registered.length} ` +
        `updated=${report.updated.length} unchanged=${report.unchanged.length} errors=${errors.length}`,
    );

    return report;
  }

  private async listWorkflowDirectories(): Promise<string[] | null> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
        .map(entry => entry.name)
        .sort(compareStringsByCodeUnit);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }

      throw error;
    }
  }

  private async loadWorkflow(name: string, path: string): Promise<WorkflowDefinition> {
    const [promptContent, configContent, toolsContent] = await Promise.all([
      readOptionalFile(join(path, WORKFLOW_PROMPT_FILE)),
      readOptionalFile(join(path, WORKFLOW_CONFIG_FILE)),
      readOptionalFile(join(path, WORKFLOW_TOOLS_FILE)),
    ]);

    if (promptContent === null) {
      throw new WorkflowSourceError(`Missing ${WORKFLOW_PROMPT_FILE}.`);
    }

    const promptTemplate = promptContent.replace(/\r\n/g, '\n').trimEnd();
    if (promptTemplate.trim().length === 0) {
      throw new WorkflowSourceError(`${WORKFLOW_PROMPT_FILE} is empty.`);
    }

    const config = configContent === null ? null : parseWorkflowConfig(configContent);
    const fileTools = toolsContent === null
      ? null
      : parseToolList(WORKFLOW_TOOLS_FILE, 'content', parseJsonFile(WORKFLOW_TOOLS_FILE, toolsContent));

    const definition: Omit<WorkflowDefinition, 'contentHash'> = {
      name,
      displayName: config?.displayName ?? toDisplayName(name),
      description: config?.description ?? firstPromptLine(promptTemplate),
      promptTemplate,
      allowedTools: fileTools ?? config?.allowedTools ?? [],
      suggestedMaxTurns: config?.suggestedMaxTurns ?? null,
      sourcePath: path,
    };

    return { ...definition, contentHash: computeWorkflowContentHash(definition) };
  }
}
