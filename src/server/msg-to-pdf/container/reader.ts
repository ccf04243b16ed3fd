import { type EmbeddedMessage, Msg } from "msg-parser";
import { ConversionError, describeError, isConversionError, malformed } from "../errors/index.js";
import { type ContainerNode, ContainerTree, type NodeHandle, type NodeKind, type PropertySource } from "./tree.js";

const SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];
const HEADER_SIZE = 512;

export const DEFAULT_MAX_EMBED_DEPTH = 8;

export interface ReadOptions {
  /** Deepest allowed chain of messages attached to messages */
  maxEmbedDepth?: number;
}

/**
 * Normalizes the byte values msg-parser hands back (number arrays, typed
 * arrays or buffers) to a Uint8Array. Anything else is not binary.
 */
export function toBytes(value: unknown): Uint8Array | undefined {
  if (value instanceof Uint8Array) return value;
  if (value instanceof ArrayBuffer) return new Uint8Array(value);
  if (Array.isArray(value) && value.every((byte) => typeof byte === "number")) {
    return Uint8Array.from(value);
  }
  return undefined;
}

/**
 * Opens a .msg file with msg-parser and walks its message, recipient and
 * attachment objects into an arena, descending into attached messages up to
 * `maxEmbedDepth` levels. Throws MalformedContainer when the bytes are not a
 * readable compound file and AttachmentTooDeep past the nesting limit.
 */
export function readContainer(bytes: Uint8Array, options: ReadOptions = {}): ContainerTree {
  if (bytes.length < HEADER_SIZE) {
    throw malformed(`File is too short to be a compound file (${bytes.length} bytes)`);
  }
  if (!SIGNATURE.every((byte, index) => bytes[index] === byte)) {
    throw malformed("Missing compound file signature");
  }

  const arena = new Arena(options.maxEmbedDepth ?? DEFAULT_MAX_EMBED_DEPTH);
  try {
    arena.addMessage(Msg.fromUint8Array(bytes), null, 0);
  } catch (error) {
    if (isConversionError(error)) throw error;
    throw new ConversionError("MalformedContainer", `Unreadable message container: ${describeError(error)}`, {
      cause: error,
    });
  }
  return new ContainerTree(arena.nodes);
}

class Arena {
  readonly nodes: ContainerNode[] = [];

  constructor(private readonly maxEmbedDepth: number) {}

  addMessage(msg: Msg, parent: NodeHandle | null, depth: number): void {
    const handle = this.push("message", parent === null ? "message" : "attached message", parent, depth, msg).handle;

    msg.recipients().forEach((recipient, index) => {
      this.push("recipient", `recipient ${index + 1}`, handle, depth, recipient);
    });

    let count = 0;
    for (const attachment of msg.attachments()) {
      // Attached messages and removed or linked files carry no data stream;
      // the former come from embeddedMessages() below
      const content = toBytes(attachment.content());
      if (!content || content.length === 0) continue;
      const node = this.push("attachment", `attachment ${++count}`, handle, depth, attachment);
      node.content = content;
    }

    for (const embedded of msg.embeddedMessages()) {
      this.addEmbedded(msg, embedded, `attachment ${++count}`, handle, depth);
    }
  }

  private addEmbedded(msg: Msg, embedded: EmbeddedMessage, name: string, parent: NodeHandle, depth: number): void {
    const node = this.push("attachment", name, parent, depth, embedded);
    node.embedded = true;

    if (depth + 1 > this.maxEmbedDepth) {
      throw new ConversionError(
        "AttachmentTooDeep",
        `Attached message at ${this.path(node)} exceeds the nesting limit of ${this.maxEmbedDepth}`,
      );
    }
    this.addMessage(msg.extractEmbeddedMessage(embedded), node.handle, depth + 1);
  }

  private push(
    kind: NodeKind,
    name: string,
    parent: NodeHandle | null,
    depth: number,
    properties: PropertySource,
  ): ContainerNode {
    const node: ContainerNode = { handle: this.nodes.length, kind, name, parent, children: [], depth, properties };
    this.nodes.push(node);
    if (parent !== null) this.nodes[parent].children.push(node.handle);
    return node;
  }

  private path(node: ContainerNode): string {
    const parts: string[] = [];
    for (let current: ContainerNode | undefined = node; current && current.parent !== null; ) {
      parts.unshift(current.name);
      current = this.nodes[current.parent];
    }
    return `/${parts.join("/")}`;
  }
}
