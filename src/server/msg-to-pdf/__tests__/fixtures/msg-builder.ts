import CFB from "cfb";

/**
 * Builds .msg containers in memory with the cfb package so tests never depend
 * on files from disk.
 */

export type FixtureValue =
  | { type: "string"; value: string }
  | { type: "binary"; value: Uint8Array }
  | { type: "int"; value: number }
  | { type: "bool"; value: boolean }
  | { type: "time"; value: Date };

export interface FixtureProperty {
  id: number;
  value: FixtureValue;
}

export interface NamedFixtureProperty {
  lid: number;
  guid: string;
  value: FixtureValue;
}

interface FixtureStream {
  path: string;
  content: Uint8Array;
}

export interface AttachmentFixture {
  properties: FixtureProperty[];
  embedded?: MsgFixture;
}

export interface MsgFixture {
  properties?: FixtureProperty[];
  recipients?: FixtureProperty[][];
  attachments?: AttachmentFixture[];
  /** Only honoured on the top-level message, as in real files */
  named?: NamedFixtureProperty[];
}

export const str = (id: number, value: string): FixtureProperty => ({ id, value: { type: "string", value } });
export const bin = (id: number, value: Uint8Array): FixtureProperty => ({ id, value: { type: "binary", value } });
export const int = (id: number, value: number): FixtureProperty => ({ id, value: { type: "int", value } });
export const bool = (id: number, value: boolean): FixtureProperty => ({ id, value: { type: "bool", value } });
export const time = (id: number, value: Date): FixtureProperty => ({ id, value: { type: "time", value } });

const TYPE_CODES: Record<FixtureValue["type"], number> = {
  string: 0x001f,
  binary: 0x0102,
  int: 0x0003,
  bool: 0x000b,
  time: 0x0040,
};

const FILETIME_EPOCH_OFFSET_MS = 11644473600000n;

export function buildMsg(fixture: MsgFixture): Uint8Array {
  const named = fixture.named ?? [];
  const namedProperties: FixtureProperty[] = named.map((n, i) => ({ id: 0x8000 + i, value: n.value }));
  const streams = messageStreams(
    { ...fixture, properties: [...(fixture.properties ?? []), ...namedProperties] },
    "",
    32,
  );
  if (named.length > 0) {
    streams.push(...nameIdStreams(named));
  }

  const container = CFB.utils.cfb_new();
  for (const stream of streams) {
    CFB.utils.cfb_add(container, stream.path, Buffer.from(stream.content));
  }
  const written: unknown = CFB.write(container, { type: "buffer" });
  if (!(written instanceof Uint8Array)) {
    throw new Error("cfb did not produce a buffer");
  }
  return new Uint8Array(written);
}

function messageStreams(fixture: MsgFixture, storage: string, headerSize: number): FixtureStream[] {
  const recipients = fixture.recipients ?? [];
  const attachments = fixture.attachments ?? [];

  const header = new Uint8Array(headerSize);
  if (headerSize >= 24) {
    const view = new DataView(header.buffer);
    view.setUint32(8, recipients.length, true);
    view.setUint32(12, attachments.length, true);
    view.setUint32(16, recipients.length, true);
    view.setUint32(20, attachments.length, true);
  }

  const streams = propertyStreams(fixture.properties ?? [], storage, header);

  recipients.forEach((props, i) => {
    streams.push(...propertyStreams(props, `${storage}/__recip_version1.0_#${index(i)}`, new Uint8Array(8)));
  });

  attachments.forEach((attachment, i) => {
    const attachmentStorage = `${storage}/__attach_version1.0_#${index(i)}`;
    streams.push(...propertyStreams(attachment.properties, attachmentStorage, new Uint8Array(8)));
    if (attachment.embedded) {
      streams.push(...messageStreams(attachment.embedded, `${attachmentStorage}/__substg1.0_3701000D`, 24));
    }
  });

  return streams;
}

function propertyStreams(properties: FixtureProperty[], storage: string, header: Uint8Array): FixtureStream[] {
  const table = new Uint8Array(header.length + properties.length * 16);
  table.set(header, 0);
  const view = new DataView(table.buffer);
  const streams: FixtureStream[] = [];

  properties.forEach((property, i) => {
    const offset = header.length + i * 16;
    const type = TYPE_CODES[property.value.type];
    view.setUint32(offset, ((property.id << 16) | type) >>> 0, true);
    view.setUint32(offset + 4, 0x6, true);

    const value = property.value;
    switch (value.type) {
      case "int":
        view.setInt32(offset + 8, value.value, true);
        break;
      case "bool":
        view.setUint16(offset + 8, value.value ? 1 : 0, true);
        break;
      case "time": {
        const ticks = (BigInt(value.value.getTime()) + FILETIME_EPOCH_OFFSET_MS) * 10000n;
        view.setBigUint64(offset + 8, ticks, true);
        break;
      }
      default: {
        const content = variableContent(value);
        view.setUint32(offset + 8, content.length, true);
        streams.push({ path: `${storage}/${substgName(property.id, type)}`, content });
      }
    }
  });

  return [{ path: `${storage}/__properties_version1.0`, content: table }, ...streams];
}

function variableContent(value: FixtureValue): Uint8Array {
  switch (value.type) {
    case "string":
      return new Uint8Array(Buffer.from(value.value, "utf16le"));
    case "binary":
      return value.value;
    default:
      return new Uint8Array(0);
  }
}

function nameIdStreams(named: NamedFixtureProperty[]): FixtureStream[] {
  const guids: string[] = [];
  for (const n of named) {
    if (!guids.includes(n.guid.toLowerCase())) guids.push(n.guid.toLowerCase());
  }

  const guidStream = new Uint8Array(guids.length * 16);
  guids.forEach((guid, i) => guidStream.set(guidToBytes(guid), i * 16));

  const entryStream = new Uint8Array(named.length * 8);
  const view = new DataView(entryStream.buffer);
  named.forEach((n, i) => {
    const guidIndex = guids.indexOf(n.guid.toLowerCase()) + 3;
    view.setUint32(i * 8, n.lid, true);
    view.setUint32(i * 8 + 4, ((i << 16) | (guidIndex << 1)) >>> 0, true);
  });

  return [
    { path: "/__nameid_version1.0/__substg1.0_00020102", content: guidStream },
    { path: "/__nameid_version1.0/__substg1.0_00030102", content: entryStream },
    { path: "/__nameid_version1.0/__substg1.0_00040102", content: new Uint8Array(0) },
  ];
}

/** Mixed-endian GUID layout used by MAPI */
export function guidToBytes(guid: string): Uint8Array {
  const hex = guid.replace(/[{}-]/g, "");
  const bytes = new Uint8Array(16);
  const raw = Buffer.from(hex, "hex");
  const order = [3, 2, 1, 0, 5, 4, 7, 6, 8, 9, 10, 11, 12, 13, 14, 15];
  order.forEach((from, to) => {
    bytes[to] = raw[from];
  });
  return bytes;
}

function substgName(id: number, type: number): string {
  return `__substg1.0_${hex4(id)}${hex4(type)}`;
}

function hex4(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, "0");
}

function index(i: number): string {
  return i.toString(16).toUpperCase().padStart(8, "0");
}

export const PSETID_APPOINTMENT = "00062002-0000-0000-c000-000000000046";
