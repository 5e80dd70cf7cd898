/**
 * Template Engine
 *
 * Small template language used by deferred-render responses.
 *
 * ```html
 * <h1>{{ title|upper }}</h1>
 * {% if user %}<p>Hello {{ user.name }}</p>{% else %}<p>Hello stranger</p>{% endif %}
 * <ul>{% for item in items %}<li>{{ loop.index1 }}. {{ item }}</li>{% endfor %}</ul>
 * {{{ trustedHtml }}}
 * ```
 *
 * `{{ }}` output is HTML-escaped, `{{{ }}}` is written as is.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

export interface TemplateOptions {
  viewsPath?: string;
  extension?: string;
  cache?: boolean;
}

export interface TemplateContext {
  [key: string]: unknown;
}

/**
 * What a deferred-render response needs from a template engine
 */
export interface TemplateRenderer {
  render(name: string, context: TemplateContext): Promise<string>;
  /**
   * Load and parse the template now, then render it lazily, one top-level
   * segment (or loop iteration) per chunk
   */
  renderChunks(name: string, context: TemplateContext): Promise<AsyncIterable<string>>;
}

type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'output'; expression: string; escape: boolean }
  | { type: 'if'; condition: string; then: TemplateNode[]; otherwise: TemplateNode[] }
  | { type: 'for'; item: string; iterable: string; body: TemplateNode[] };

type BlockNode = Extract<TemplateNode, { type: 'if' | 'for' }>;

interface OpenBlock {
  node: BlockNode;
  parent: TemplateNode[];
}

export class TemplateSyntaxError extends Error {
  override name = 'TemplateSyntaxError';
}

export class TemplateNotFoundError extends Error {
  override name = 'TemplateNotFoundError';

  constructor(readonly templateName: string, options?: { cause?: unknown }) {
    super(`Template "${templateName}" not found`, options);
  }
}

/**
 * Marks content that must not be escaped
 */
export class SafeHtml {
  constructor(readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

const TOKEN_PATTERN = /(\{\{\{[\s\S]*?\}\}\}|\{\{[\s\S]*?\}\}|\{%[\s\S]*?%\})/;
const FOR_PATTERN = /^for\s+(\w+)\s+in\s+([\w.]+)$/;
const COMPARISON_PATTERN = /^(.+?)\s*(==|!=)\s*(.+)$/;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

const FILTERS: Record<string, (value: unknown) => unknown> = {
  upper: (value) => stringify(value).toUpperCase(),
  lower: (value) => stringify(value).toLowerCase(),
  trim: (value) => stringify(value).trim(),
  length: (value) => (Array.isArray(value) || typeof value === 'string' ? value.length : 0),
  safe: (value) => (value instanceof SafeHtml ? value : new SafeHtml(stringify(value))),
};

const DEFAULT_OPTIONS: Required<TemplateOptions> = {
  viewsPath: './templates',
  extension: '.html',
  cache: true,
};

/**
 * Template engine with named templates from memory or disk
 */
export class TemplateEngine implements TemplateRenderer {
  private readonly options: Required<TemplateOptions>;
  private readonly sources = new Map<string, string>();
  private readonly compiled = new Map<string, TemplateNode[]>();

  constructor(options: TemplateOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Register a template from a string. Takes precedence over files.
   */
  register(name: string, source: string): this {
    this.sources.set(name, source);
    this.compiled.delete(name);
    return this;
  }

  async render(name: string, context: TemplateContext = {}): Promise<string> {
    const nodes = await this.load(name);
    return renderNodes(nodes, context);
  }

  async renderChunks(name: string, context: TemplateContext = {}): Promise<AsyncIterable<string>> {
    const nodes = await this.load(name);
    return streamNodes(nodes, context);
  }

  /**
   * Render a template string without registering it
   */
  renderString(source: string, context: TemplateContext = {}): string {
    return renderNodes(parseTemplate(source), context);
  }

  private async load(name: string): Promise<TemplateNode[]> {
    const cached = this.compiled.get(name);
    if (cached) {
      return cached;
    }

    const source = this.sources.get(name) ?? (await this.readTemplateFile(name));
    const nodes = parseTemplate(source);

    if (this.options.cache) {
      this.compiled.set(name, nodes);
    }

    return nodes;
  }

  private async readTemplateFile(name: string): Promise<string> {
    const path = join(this.options.viewsPath, `${name}${this.options.extension}`);

    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new TemplateNotFoundError(name, { cause: error });
      }
      throw error;
    }
  }
}

/**
 * Escape HTML entities
 */
export function escapeHtml(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }
  return stringify(value).replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Mark content as safe (no escaping)
 */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

function parseTemplate(source: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const open: OpenBlock[] = [];
  let current = root;

  source.split(TOKEN_PATTERN).forEach((token, position) => {
    if (token === '') return;

    // split() puts captured delimiters at odd positions
    if (position % 2 === 0) {
      current.push({ type: 'text', value: token });
    } else if (token.startsWith('{{{')) {
      current.push({ type: 'output', expression: token.slice(3, -3).trim(), escape: false });
    } else if (token.startsWith('{{')) {
      current.push({ type: 'output', expression: token.slice(2, -2).trim(), escape: true });
    } else {
      current = parseTag(token.slice(2, -2).trim(), current, open);
    }
  });

  const unclosed = open.at(-1);
  if (unclosed) {
    throw new TemplateSyntaxError(`Unclosed {% ${unclosed.node.type} %} block`);
  }

  return root;
}

/**
 * Apply one `{% %}` tag; returns the node list that receives what follows
 */
function parseTag(tag: string, current: TemplateNode[], open: OpenBlock[]): TemplateNode[] {
  const keyword = tag.split(/\s+/, 1)[0];

  switch (keyword) {
    case 'if': {
      const node: BlockNode = { type: 'if', condition: tag.slice(2).trim(), then: [], otherwise: [] };
      current.push(node);
      open.push({ node, parent: current });
      return node.then;
    }
    case 'else': {
      const block = open.at(-1);
      if (!block || block.node.type !== 'if') {
        throw new TemplateSyntaxError('{% else %} outside of {% if %}');
      }
      return block.node.otherwise;
    }
    case 'for': {
      const match = FOR_PATTERN.exec(tag);
      if (!match) {
        throw new TemplateSyntaxError(`Malformed loop: {% ${tag} %}`);
      }
      const node: BlockNode = { type: 'for', item: match[1], iterable: match[2], body: [] };
      current.push(node);
      open.push({ node, parent: current });
      return node.body;
    }
    case 'endif':
    case 'endfor': {
      const block = open.pop();
      const expected = keyword === 'endif' ? 'if' : 'for';
      if (!block || block.node.type !== expected) {
        throw new TemplateSyntaxError(`{% ${keyword} %} without matching {% ${expected} %}`);
      }
      return block.parent;
    }
    default:
      throw new TemplateSyntaxError(`Unknown tag {% ${tag} %}`);
  }
}

async function* streamNodes(
  nodes: readonly TemplateNode[],
  context: TemplateContext
): AsyncGenerator<string, void, undefined> {
  for (const node of nodes) {
    if (node.type === 'for') {
      for (const scope of loopScopes(node, context)) {
        const chunk = renderNodes(node.body, scope);
        if (chunk) yield chunk;
      }
      continue;
    }

    const chunk = renderNode(node, context);
    if (chunk) yield chunk;
  }
}

function renderNodes(nodes: readonly TemplateNode[], context: TemplateContext): string {
  return nodes.map((node) => renderNode(node, context)).join('');
}

function renderNode(node: TemplateNode, context: TemplateContext): string {
  switch (node.type) {
    case 'text':
      return node.value;
    case 'output': {
      const value = evaluateExpression(node.expression, context);
      return node.escape ? escapeHtml(value) : stringify(value);
    }
    case 'if':
      return renderNodes(evaluateCondition(node.condition, context) ? node.then : node.otherwise, context);
    case 'for':
      return loopScopes(node, context)
        .map((scope) => renderNodes(node.body, scope))
        .join('');
  }
}

function loopScopes(node: Extract<TemplateNode, { type: 'for' }>, context: TemplateContext): TemplateContext[] {
  const items = lookup(context, node.iterable);
  if (!Array.isArray(items)) return [];

  return items.map((item: unknown, index) => ({
    ...context,
    [node.item]: item,
    loop: {
      index,
      index1: index + 1,
      first: index === 0,
      last: index === items.length - 1,
      length: items.length,
    },
  }));
}

function evaluateCondition(condition: string, context: TemplateContext): boolean {
  if (condition.startsWith('not ')) {
    return !evaluateCondition(condition.slice(4).trim(), context);
  }

  const comparison = COMPARISON_PATTERN.exec(condition);
  if (comparison) {
    const [, left, operator, right] = comparison;
    const equal = evaluateOperand(left.trim(), context) === evaluateOperand(right.trim(), context);
    return operator === '==' ? equal : !equal;
  }

  return isTruthy(evaluateExpression(condition, context));
}

function evaluateOperand(operand: string, context: TemplateContext): unknown {
  if (/^(['"]).*\1$/.test(operand)) return operand.slice(1, -1);
  if (/^-?\d+(\.\d+)?$/.test(operand)) return Number(operand);
  if (operand === 'true') return true;
  if (operand === 'false') return false;
  if (operand === 'null') return null;
  return evaluateExpression(operand, context);
}

function evaluateExpression(expression: string, context: TemplateContext): unknown {
  const [path, ...filters] = expression.split('|').map((part) => part.trim());
  let value = lookup(context, path);

  for (const name of filters) {
    const filter = FILTERS[name];
    if (!filter) {
      throw new TemplateSyntaxError(`Unknown filter "${name}"`);
    }
    value = filter(value);
  }

  return value;
}

function lookup(context: TemplateContext, path: string): unknown {
  let current: unknown = context;

  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }

  return current;
}

function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof SafeHtml) return value.content;
  return String(value);
}

// Default template engine instance
let defaultEngine: TemplateEngine | null = null;

/**
 * Get the default template engine
 */
export function getTemplateEngine(): TemplateEngine {
  if (!defaultEngine) {
    defaultEngine = new TemplateEngine();
  }
  return defaultEngine;
}

/**
 * Replace the default template engine
 */
export function setTemplateEngine(engine: TemplateEngine): void {
  defaultEngine = engine;
}
