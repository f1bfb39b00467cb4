import { PythonSyntaxError, type Token } from "./tokenizer.js";

export interface Group {
  readonly kind: "group";
  readonly open: Token;
  readonly close: Token;
  readonly children: Node[];
}

export type Node = Token | Group;

interface Frame {
  readonly open: Token;
  readonly children: Node[];
}

/** Folds a token stream into nested bracket groups. */
export function buildTree(tokens: readonly Token[]): Node[] {
  const root: Node[] = [];
  const stack: Frame[] = [];

  const current = (): Node[] => (stack.length > 0 ? stack[stack.length - 1].children : root);

  for (const token of tokens) {
    if (token.kind === "open") {
      stack.push({ open: token, children: [] });
    } else if (token.kind === "close") {
      const frame = stack.pop();
      if (!frame) throw new PythonSyntaxError(`unmatched '${token.text}'`, token.line);
      current().push({ kind: "group", open: frame.open, close: token, children: frame.children });
    } else {
      current().push(token);
    }
  }

  const unclosed = stack.pop();
  if (unclosed) throw new PythonSyntaxError(`'${unclosed.open.text}' was never closed`, unclosed.open.line);
  return root;
}

export function firstToken(node: Node): Token {
  return node.kind === "group" ? node.open : node;
}

/** Visits `nodes` and the children of every nested group, outermost first. */
export function forEachSequence(nodes: readonly Node[], visit: (sequence: readonly Node[]) => void): void {
  visit(nodes);
  for (const node of nodes) {
    if (node.kind === "group") forEachSequence(node.children, visit);
  }
}
