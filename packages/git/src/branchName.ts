import { randomBytes } from 'node:crypto';

export const DEFAULT_BRANCH_TEMPLATE = 'runwright/{workflow}/{run-id}';

export const BRANCH_TEMPLATE_ENV_VAR = 'RUNWRIGHT_BRANCH_TEMPLATE';

export type BranchNameContext = {
  runId: string;
  workflowName?: string;
  baseBranch?: string;
};

type GenerateBranchNameOptions = {
  now?: () => Date;
  randomHex?: (length: number) => string;
};

const TOKEN_PATTERN = /\{(run-id|workflow|base-branch|short-hash|date)\}/g;

// Characters git check-ref-format refuses inside a ref.
const REF_FORBIDDEN = /[\u0000-\u001f\u007f ~^:?*[\\]+/g;

const FALLBACK_BRANCH = 'runwright/branch';

function defaultRandomHex(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

/** Lowercase slug; separators and symbols fold into single dashes. */
function toTokenValue(value: string | undefined): string {
  return (value ?? '')
    .trim()
    .toLowerCase()
    .replaceAll(/[^a-z0-9.]+/g, '-')
    .replaceAll(/^[.-]+|[.-]+$/g, '');
}

function toRefSegment(segment: string): string {
  let value = segment
    .replaceAll(REF_FORBIDDEN, '-')
    .replaceAll('@{', '-')
    .replaceAll(/\.{2,}/g, '.')
    .replaceAll(/-{2,}/g, '-');

  let previous: string;
  do {
    previous = value;
    value = value.replaceAll(/^[.-]+|[.-]+$/g, '').replace(/\.lock$/, '');
  } while (value !== previous);

  return value;
}

function toRefName(raw: string): string {
  const name = raw
    .split('/')
    .map(toRefSegment)
    .filter(segment => segment.length > 0)
    .join('/');
  return name.length > 0 ? name : FALLBACK_BRANCH;
}

export function resolveBranchTemplate(
  template?: string | null,
  environment: NodeJS.ProcessEnv = process.env,
): string {
  if (template?.trim()) {
    return template.trim();
  }

  const envTemplate = environment[BRANCH_TEMPLATE_ENV_VAR];
  if (envTemplate?.trim()) {
    return envTemplate.trim();
  }

  return DEFAULT_BRANCH_TEMPLATE;
}

export function generateBranchName(
  template: string,
  context: BranchNameContext,
  options: GenerateBranchNameOptions = {},
): string {
  const now = options.now ?? (() => new Date());
  const randomHex = options.randomHex ?? defaultRandomHex;
  const values = new Map<string, () => string | undefined>([
    ['run-id', () => context.runId],
    ['workflow', () => context.workflowName],
    ['base-branch', () => context.baseBranch],
    ['short-hash', () => randomHex(6)],
    ['date', () => now().toISOString().slice(0, 10)],
  ]);

  let name = template.replaceAll(TOKEN_PATTERN, (_match, token: string) => toTokenValue(values.get(token)?.()));
  // Branch names always carry the run id.
  if (!template.includes('{run-id}')) {
    name = `${name}/${toTokenValue(context.runId)}`;
  }

  return toRefName(name);
}

export function generateConfiguredBranchName(
  context: BranchNameContext,
  template?: string | null,
  options?: GenerateBranchNameOptions & { environment?: NodeJS.ProcessEnv },
): string {
  return generateBranchName(resolveBranchTemplate(template, options?.environment), context, options);
}
