import { DuplicateKeyError } from './errors.js';
import type { Translation } from './translation.js';

/**
 * A terminal key under a node. The text itself lives in the owning
 * translation's entry.
 */
export class TranslationTreeLeaf {
  constructor(public readonly key: string, public readonly isTemplated: boolean) {}
}

/**
 * A group of keys. Children are looked up case-insensitively while `name`
 * keeps the casing it was first created with. Nodes only know their own name,
 * never their full path.
 */
export class TranslationTreeNode {
  private readonly children = new Map<string, TranslationTreeNode>();
  private readonly leaves = new Map<string, TranslationTreeLeaf>();

  constructor(public readonly name: string) {}

  public get childNodes(): TranslationTreeNode[] {
    return Array.from(this.children.values());
  }

  public get keys(): TranslationTreeLeaf[] {
    return Array.from(this.leaves.values());
  }

  public getChild(name: string): TranslationTreeNode | undefined {
    return this.children.get(name.toLowerCase());
  }

  public getLeaf(key: string): TranslationTreeLeaf | undefined {
    return this.leaves.get(key);
  }

  public hasLeaf(key: string): boolean {
    return this.leaves.has(key);
  }

  /**
   * Resolve a dotted path below this node without creating anything.
   * Returns null for an empty path, an empty segment or a missing node.
   */
  public findNode(path: string): TranslationTreeNode | null {
    if (!path) {
      return null;
    }

    const dot = path.indexOf('.');
    if (dot === -1) {
      return this.getChild(path) ?? null;
    }
    if (dot === 0) {
      return null;
    }

    const child = this.getChild(path.slice(0, dot));
    return child ? child.findNode(path.slice(dot + 1)) : null;
  }

  /**
   * Resolve a dotted path below this node, creating missing nodes on the way.
   * Returns null for an empty path or an empty segment.
   */
  public makeNode(path: string): TranslationTreeNode | null {
    if (!path) {
      return null;
    }

    const dot = path.indexOf('.');
    if (dot === 0) {
      return null;
    }

    const ownName = dot === -1 ? path : path.slice(0, dot);
    if (dot !== -1 && !isValidPath(path.slice(dot + 1))) {
      return null;
    }

    let child = this.getChild(ownName);
    if (!child) {
      child = new TranslationTreeNode(ownName);
      this.children.set(ownName.toLowerCase(), child);
    }

    return dot === -1 ? child : child.makeNode(path.slice(dot + 1));
  }

  public addLeaf(key: string, isTemplated: boolean): TranslationTreeLeaf {
    if (this.leaves.has(key)) {
      throw new DuplicateKeyError(key);
    }
    const leaf = new TranslationTreeLeaf(key, isTemplated);
    this.leaves.set(key, leaf);
    return leaf;
  }
}

// every segment non-empty
function isValidPath(path: string): boolean {
  return path.length > 0 && path.split('.').every((segment) => segment.length > 0);
}

/**
 * Keys of one translation arranged by their dotted groups.
 */
export class TranslationTree {
  public readonly rootNode = new TranslationTreeNode('');

  public findNode(path: string): TranslationTreeNode | null {
    return this.rootNode.findNode(path);
  }

  public makeNode(path: string): TranslationTreeNode | null {
    return this.rootNode.makeNode(path);
  }

  /**
   * Insert a qualified key as a leaf under the node of its group path.
   * Returns null when the key has an empty segment.
   */
  public addEntry(qualifiedKey: string, isTemplated: boolean): TranslationTreeLeaf | null {
    const dot = qualifiedKey.lastIndexOf('.');
    if (dot === -1) {
      return qualifiedKey ? this.rootNode.addLeaf(qualifiedKey, isTemplated) : null;
    }

    const name = qualifiedKey.slice(dot + 1);
    if (!name) {
      return null;
    }
    const node = this.makeNode(qualifiedKey.slice(0, dot));
    if (!node) {
      return null;
    }
    if (node.hasLeaf(name)) {
      // groups match case-insensitively, so `A.b` and `a.b` collide here
      throw new DuplicateKeyError(qualifiedKey);
    }
    return node.addLeaf(name, isTemplated);
  }
}

/**
 * Build a tree view holding one leaf per entry of the translation.
 * Keys that cannot be placed in a tree (empty segments) are returned in `skipped`.
 * Throws DuplicateKeyError when two keys differ only in the casing of a group.
 */
export function buildTranslationTree(translation: Translation): { tree: TranslationTree; skipped: string[] } {
  const tree = new TranslationTree();
  const skipped: string[] = [];

  for (const entry of translation) {
    if (!tree.addEntry(entry.key, entry.isTemplated)) {
      skipped.push(entry.key);
    }
  }

  return { tree, skipped };
}
