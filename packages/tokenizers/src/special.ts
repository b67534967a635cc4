/**
 * Literal special-token matching with a trie.
 *
 * At each position the longest registered literal wins; positions with no
 * match fall through to plain text. No pattern engine is involved, so the
 * result never depends on registration order.
 */

type TrieNode = {
  kids: Map<string, TrieNode>;
  id?: number;
};

export type Segment =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "special"; readonly id: number };

export class SpecialTokenMatcher {
  private readonly _root: TrieNode = { kids: new Map() };
  private _size = 0;

  get size(): number {
    return this._size;
  }

  add(token: string, id: number): void {
    let node = this._root;
    for (let k = 0; k < token.length; k++) {
      const ch = token[k];
      let kid = node.kids.get(ch);
      if (!kid) {
        kid = { kids: new Map() };
        node.kids.set(ch, kid);
      }
      node = kid;
    }
    if (node.id === undefined) this._size++;
    node.id = id;
  }

  clear(): void {
    this._root.kids.clear();
    this._root.id = undefined;
    this._size = 0;
  }

  /** Longest literal starting at `start`, or null. */
  matchAt(text: string, start: number): { id: number; length: number } | null {
    let node = this._root;
    let best: { id: number; length: number } | null = null;
    for (let i = start; i < text.length; i++) {
      const kid = node.kids.get(text[i]);
      if (!kid) break;
      node = kid;
      if (node.id !== undefined) best = { id: node.id, length: i + 1 - start };
    }
    return best;
  }

  /** Partition `text` into alternating plain and special segments. */
  split(text: string): Segment[] {
    if (this._size === 0) return text.length > 0 ? [{ kind: "text", text }] : [];

    const segments: Segment[] = [];
    let plainStart = 0;
    let i = 0;
    while (i < text.length) {
      const match = this.matchAt(text, i);
      if (match) {
        if (i > plainStart) segments.push({ kind: "text", text: text.slice(plainStart, i) });
        segments.push({ kind: "special", id: match.id });
        i += match.length;
        plainStart = i;
      } else {
        i += 1;
      }
    }
    if (plainStart < text.length) segments.push({ kind: "text", text: text.slice(plainStart) });
    return segments;
  }
}
