/**
 * Tree graph parser
 *
 * Reads the Graphviz DOT subset that tree generators emit (one digraph,
 * node and edge statements with attribute lists) and turns it into a
 * validated DecisionTree. Malformed input fails with ParseError; nothing
 * is guessed.
 */

import { ParseError, TreeStructureError } from '../utils/errors.js';
import { DecisionTree, TreeBuilder, type TreeOptions } from './decision-tree.js';
import { parseLabel } from './label-grammar.js';
import { BRANCH_ORDER, type BranchLabel, type NodeId } from './types.js';

type TokenKind = 'id' | 'string' | 'punct';

interface Token {
  kind: TokenKind;
  value: string;
  line: number;
}

export interface DotNodeDecl {
  id: string;
  attributes: Record<string, string>;
  line: number;
}

export interface DotEdgeDecl {
  source: string;
  target: string;
  attributes: Record<string, string>;
  line: number;
}

/** Graph as written: declared nodes in order and edges in order. */
export interface DotGraph {
  name?: string;
  nodes: Map<string, DotNodeDecl>;
  edges: DotEdgeDecl[];
}

const PUNCTUATION = ['->', '--', '{', '}', '[', ']', '=', ';', ',', ':'];

const ID_PATTERN = /[A-Za-z_\u0080-\uFFFF][A-Za-z0-9_\u0080-\uFFFF]*|-?(?:\.\d+|\d+(?:\.\d*)?)/y;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Comments: //, /* */, and # lines (preprocessor output)
    if (ch === '/' && text[i + 1] === '/') {
      while (i < text.length && text[i] !== '\n') i++;
      continue;
    }
    if (ch === '#' && (i === 0 || text[i - 1] === '\n')) {
      while (i < text.length && text[i] !== '\n') i++;
      continue;
    }
    if (ch === '/' && text[i + 1] === '*') {
      const end = text.indexOf('*/', i + 2);
      if (end === -1) {
        throw new ParseError('unterminated comment', line);
      }
      line += countNewlines(text.slice(i, end));
      i = end + 2;
      continue;
    }

    if (ch === '"') {
      const startLine = line;
      let value = '';
      i++;
      while (i < text.length && text[i] !== '"') {
        if (text[i] === '\\' && i + 1 < text.length) {
          const next = text[i + 1];
          if (next === '"' || next === '\\') {
            value += next;
          } else if (next === 'n' || next === 'l' || next === 'r') {
            value += '\n';
          } else if (next === '\n') {
            // line continuation
            line++;
          } else {
            value += '\\' + next;
          }
          i += 2;
          continue;
        }
        if (text[i] === '\n') line++;
        value += text[i];
        i++;
      }
      if (i >= text.length) {
        throw new ParseError('unterminated string', startLine);
      }
      i++;
      tokens.push({ kind: 'string', value, line: startLine });
      continue;
    }

    const punct = PUNCTUATION.find((p) => text.startsWith(p, i));
    if (punct) {
      tokens.push({ kind: 'punct', value: punct, line });
      i += punct.length;
      continue;
    }

    ID_PATTERN.lastIndex = i;
    const idMatch = ID_PATTERN.exec(text);
    if (idMatch) {
      tokens.push({ kind: 'id', value: idMatch[0], line });
      i += idMatch[0].length;
      continue;
    }

    throw new ParseError(`unexpected character "${ch}"`, line);
  }

  return tokens;
}

function countNewlines(text: string): number {
  let n = 0;
  for (const ch of text) if (ch === '\n') n++;
  return n;
}

class TokenStream {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  next(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      const last = this.tokens[this.tokens.length - 1];
      throw new ParseError('unexpected end of input', last?.line);
    }
    this.index++;
    return token;
  }

  isPunct(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token !== undefined && token.kind === 'punct' && token.value === value;
  }

  expectPunct(value: string): Token {
    const token = this.next();
    if (token.kind !== 'punct' || token.value !== value) {
      throw new ParseError(`expected "${value}" but found "${token.value}"`, token.line);
    }
    return token;
  }

  expectId(what: string): Token {
    const token = this.next();
    if (token.kind === 'punct') {
      throw new ParseError(`expected ${what} but found "${token.value}"`, token.line);
    }
    return token;
  }

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }
}

function parseAttributeLists(stream: TokenStream): Record<string, string> {
  const attributes: Record<string, string> = {};
  while (stream.isPunct('[')) {
    stream.next();
    while (!stream.isPunct(']')) {
      const key = stream.expectId('attribute name');
      let value = 'true';
      if (stream.isPunct('=')) {
        stream.next();
        value = stream.expectId(`value for "${key.value}"`).value;
      }
      attributes[key.value] = value;
      if (stream.isPunct(',') || stream.isPunct(';')) {
        stream.next();
      }
    }
    stream.expectPunct(']');
  }
  return attributes;
}

/**
 * Syntax pass: collect declared nodes and edges. Structure is not checked
 * here.
 */
export function parseDotGraph(text: string): DotGraph {
  const stream = new TokenStream(tokenize(text));
  const graph: DotGraph = { nodes: new Map(), edges: [] };

  const first = stream.next();
  let keyword = first;
  if (first.kind === 'id' && first.value.toLowerCase() === 'strict') {
    keyword = stream.next();
  }
  if (keyword.kind !== 'id' || keyword.value.toLowerCase() !== 'digraph') {
    throw new ParseError(`expected "digraph" but found "${keyword.value}"`, keyword.line);
  }
  if (!stream.isPunct('{')) {
    graph.name = stream.expectId('graph name').value;
  }
  stream.expectPunct('{');

  const touchNode = (id: string, line: number): DotNodeDecl => {
    let node = graph.nodes.get(id);
    if (!node) {
      node = { id, attributes: {}, line };
      graph.nodes.set(id, node);
    }
    return node;
  };

  while (!stream.isPunct('}')) {
    if (stream.isPunct(';')) {
      stream.next();
      continue;
    }

    const head = stream.expectId('statement');
    const lowered = head.value.toLowerCase();

    if (head.kind === 'id' && lowered === 'subgraph') {
      throw new ParseError('subgraphs are not supported in tree graphs', head.line);
    }

    if (head.kind === 'id' && (lowered === 'node' || lowered === 'edge' || lowered === 'graph') && stream.isPunct('[')) {
      // Default attributes carry no tree structure.
      parseAttributeLists(stream);
      continue;
    }

    if (stream.isPunct('=')) {
      stream.next();
      stream.expectId(`value for "${head.value}"`);
      continue;
    }

    // Port syntax (a:port) is accepted and ignored.
    const skipPort = (): void => {
      while (stream.isPunct(':')) {
        stream.next();
        stream.expectId('port');
      }
    };
    skipPort();

    if (stream.isPunct('--')) {
      throw new ParseError('undirected edges are not allowed in a digraph', head.line);
    }

    if (stream.isPunct('->')) {
      const chain: Token[] = [head];
      while (stream.isPunct('->')) {
        stream.next();
        chain.push(stream.expectId('edge target'));
        skipPort();
      }
      const attributes = parseAttributeLists(stream);
      for (let k = 0; k < chain.length - 1; k++) {
        touchNode(chain[k].value, chain[k].line);
        touchNode(chain[k + 1].value, chain[k + 1].line);
        graph.edges.push({
          source: chain[k].value,
          target: chain[k + 1].value,
          attributes: { ...attributes },
          line: chain[k].line,
        });
      }
      continue;
    }

    const node = touchNode(head.value, head.line);
    Object.assign(node.attributes, parseAttributeLists(stream));
  }

  stream.expectPunct('}');
  if (!stream.atEnd()) {
    const extra = stream.next();
    throw new ParseError(`unexpected "${extra.value}" after graph body`, extra.line);
  }

  return graph;
}

const TRUE_LABELS = new Set(['true', 'yes', 't', '1']);
const FALSE_LABELS = new Set(['false', 'no', 'f', '0']);

/**
 * Map an edge label onto a branch. `undefined` means the edge is unlabelled.
 */
export function normalizeBranchLabel(label: string | undefined): BranchLabel | undefined | null {
  if (label === undefined) return undefined;
  const text = label.trim().toLowerCase();
  if (text === '') return undefined;
  if (TRUE_LABELS.has(text)) return 'true';
  if (FALSE_LABELS.has(text)) return 'false';
  return null;
}

export type ParseTreeOptions = TreeOptions;

/**
 * Parse a tree graph into a DecisionTree.
 *
 * Fails when there is no unique root, a node has more than one parent, a
 * cycle or unreachable node exists, a decision node lacks a branch, or a
 * label is not understood.
 */
/** Deepest leaf a parsed tree may have, in edges from the root. Tree operations recurse per level. */
export const MAX_TREE_DEPTH = 1000;

export function parseTreeGraph(text: string, options: ParseTreeOptions = {}): DecisionTree {
  const graph = parseDotGraph(text);
  const knownActions = options.actions ? new Set(options.actions) : undefined;

  const parentOf = new Map<string, string>();
  const outgoing = new Map<string, DotEdgeDecl[]>();
  for (const edge of graph.edges) {
    const existingParent = parentOf.get(edge.target);
    if (existingParent !== undefined) {
      throw new ParseError(
        `node "${edge.target}" has more than one parent ("${existingParent}" and "${edge.source}")`,
        edge.line
      );
    }
    parentOf.set(edge.target, edge.source);
    const list = outgoing.get(edge.source) ?? [];
    list.push(edge);
    outgoing.set(edge.source, list);
  }

  const roots = Array.from(graph.nodes.keys()).filter((id) => !parentOf.has(id));
  if (roots.length !== 1) {
    throw new ParseError(
      roots.length === 0 ? 'no unique root: every node has a parent' : `no unique root: candidates ${roots.map((r) => `"${r}"`).join(', ')}`
    );
  }

  const builder = new TreeBuilder();
  const visited = new Set<string>();

  const branchesOf = (id: string, edges: DotEdgeDecl[]): Record<BranchLabel, string> => {
    const assigned: Partial<Record<BranchLabel, string>> = {};
    const unlabelled: DotEdgeDecl[] = [];
    for (const edge of edges) {
      const branch = normalizeBranchLabel(edge.attributes.label);
      if (branch === null) {
        throw new ParseError(`edge "${edge.source}" -> "${edge.target}" has unsupported branch label "${edge.attributes.label}"`, edge.line);
      }
      if (branch === undefined) {
        unlabelled.push(edge);
        continue;
      }
      if (assigned[branch] !== undefined) {
        throw new ParseError(`node "${id}" has two "${branch}" branches`, edge.line);
      }
      assigned[branch] = edge.target;
    }
    // Unlabelled edges fill true, then false, in declaration order.
    for (const edge of unlabelled) {
      const free = BRANCH_ORDER.find((b) => assigned[b] === undefined);
      if (free === undefined) {
        throw new ParseError(`node "${id}" has more than two branches`, edge.line);
      }
      assigned[free] = edge.target;
    }
    const trueTarget = assigned.true;
    const falseTarget = assigned.false;
    if (trueTarget === undefined || falseTarget === undefined) {
      throw new ParseError(`decision node "${id}" is missing its "${trueTarget === undefined ? 'true' : 'false'}" branch`);
    }
    return { true: trueTarget, false: falseTarget };
  };

  const build = (id: string, depth: number): NodeId => {
    visited.add(id);
    const decl = graph.nodes.get(id);
    if (!decl) {
      throw new ParseError(`edge refers to undeclared node "${id}"`);
    }
    if (depth > MAX_TREE_DEPTH) {
      throw new ParseError(`node "${id}" is more than ${MAX_TREE_DEPTH} edges below the root`, decl.line);
    }
    const labelText = decl.attributes.label ?? id;
    const label = parseLabel(labelText);
    const edges = outgoing.get(id) ?? [];

    if (label.kind === 'unrecognized') {
      throw new ParseError(`cannot interpret label of node "${id}": ${label.reason}`, decl.line);
    }

    if (edges.length === 0) {
      if (label.kind === 'predicate') {
        throw new ParseError(`decision node "${id}" is missing its branches`, decl.line);
      }
      if (knownActions && !knownActions.has(label.action)) {
        throw new ParseError(`leaf "${id}" uses unknown action "${label.action}"`, decl.line);
      }
      return builder.leaf(label.action, id);
    }

    if (label.kind === 'action') {
      throw new ParseError(`leaf "${id}" (action "${label.action}") has outgoing edges`, decl.line);
    }

    const targets = branchesOf(id, edges);
    const trueId = build(targets.true, depth + 1);
    const falseId = build(targets.false, depth + 1);
    return builder.decision(label.predicate, { true: trueId, false: falseId }, id);
  };

  const rootId = build(roots[0], 0);

  const unreachable = Array.from(graph.nodes.keys()).filter((id) => !visited.has(id));
  if (unreachable.length > 0) {
    throw new ParseError(`cycle or unreachable nodes: ${unreachable.map((u) => `"${u}"`).join(', ')}`);
  }

  try {
    return builder.build(rootId, options);
  } catch (error) {
    if (error instanceof TreeStructureError) {
      throw new ParseError(error.message);
    }
    throw error;
  }
}
