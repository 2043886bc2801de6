export const ROOT_ID = 'root';

export interface TreeNode<TData> {
  readonly tag: string;
  readonly identifier: string;
  readonly parent?: string;
  data?: TData;
}

export class DuplicateNodeError extends Error {
  constructor(identifier: string) {
    super(`Node "${identifier}" already exists`);
    this.name = 'DuplicateNodeError';
  }
}

export class MissingParentError extends Error {
  constructor(identifier: string, parent: string) {
    super(`Parent "${parent}" of node "${identifier}" is not in the tree`);
    this.name = 'MissingParentError';
  }
}

/**
 * Rooted tree keyed by identifier. Nodes keep a parent link only; the
 * classification of a node is its chain of ancestors.
 */
export class TaxonTree<TData> {
  private readonly nodes = new Map<string, TreeNode<TData>>();

  constructor() {
    this.nodes.set(ROOT_ID, { tag: ROOT_ID, identifier: ROOT_ID });
  }

  /** Node count, root excluded */
  get size(): number {
    return this.nodes.size - 1;
  }

  has(identifier: string): boolean {
    return this.nodes.has(identifier);
  }

  get(identifier: string): TreeNode<TData> | undefined {
    return this.nodes.get(identifier);
  }

  add(
    tag: string,
    identifier: string,
    parent: string,
    data: TData
  ): TreeNode<TData> {
    if (this.nodes.has(identifier)) {
      throw new DuplicateNodeError(identifier);
    }
    if (!this.nodes.has(parent)) {
      throw new MissingParentError(identifier, parent);
    }

    const node: TreeNode<TData> = { tag, identifier, parent, data };
    this.nodes.set(identifier, node);
    return node;
  }

  parentOf(identifier: string): TreeNode<TData> | undefined {
    const parent = this.nodes.get(identifier)?.parent;
    return parent === undefined ? undefined : this.nodes.get(parent);
  }

  /**
   * Ancestors nearest first, root excluded.
   */
  ancestors(identifier: string): TreeNode<TData>[] {
    const chain: TreeNode<TData>[] = [];
    let node = this.parentOf(identifier);

    while (node && node.identifier !== ROOT_ID) {
      chain.push(node);
      node = this.parentOf(node.identifier);
    }

    return chain;
  }
}
