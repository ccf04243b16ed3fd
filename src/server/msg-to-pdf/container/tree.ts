import type { PropertyId } from "../parsing/properties.js";

export type NodeHandle = number;

export type NodeKind = "message" | "recipient" | "attachment";

/** Raw property reads, as msg-parser's message, recipient and attachment objects offer them */
export interface PropertySource {
  getProperty(id: PropertyId): unknown;
}

export interface ContainerNode {
  handle: NodeHandle;
  kind: NodeKind;
  name: string;
  parent: NodeHandle | null;
  children: NodeHandle[];
  /** Embedding level: 0 for the top-level message and everything directly under it */
  depth: number;
  properties: PropertySource;
  /** Attachment bytes, never empty; undefined for messages, recipients and attached messages */
  content?: Uint8Array;
  /** Set on attachments whose single child is an attached message */
  embedded?: boolean;
}

/**
 * The objects of a .msg file held in a flat arena and addressed by handle.
 * Parent/child links are handles, never object references.
 */
export class ContainerTree {
  readonly root: NodeHandle = 0;

  constructor(private readonly nodes: readonly ContainerNode[]) {
    if (nodes.length === 0 || nodes[0].kind !== "message") {
      throw new Error("ContainerTree requires a message node at handle 0");
    }
  }

  get size(): number {
    return this.nodes.length;
  }

  node(handle: NodeHandle): ContainerNode {
    const node = this.nodes[handle];
    if (!node) {
      throw new RangeError(`No container node with handle ${handle}`);
    }
    return node;
  }

  children(handle: NodeHandle, kind?: NodeKind): ContainerNode[] {
    const children = this.node(handle).children.map((child) => this.node(child));
    return kind ? children.filter((child) => child.kind === kind) : children;
  }

  /** The message held by an attached-message node */
  embeddedMessage(handle: NodeHandle): ContainerNode | undefined {
    const node = this.node(handle);
    return node.embedded ? this.children(handle, "message")[0] : undefined;
  }

  /** Slash-separated path from the root, for diagnostics */
  path(handle: NodeHandle): string {
    const parts: string[] = [];
    let current: NodeHandle | null = handle;
    while (current !== null && current !== this.root) {
      const node: ContainerNode = this.node(current);
      parts.unshift(node.name);
      current = node.parent;
    }
    return `/${parts.join("/")}`;
  }
}
