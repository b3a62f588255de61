import type { SendMailOptions } from "nodemailer";
import type { MailTransport } from "../services/emailService";
import type { LatexImageRenderer } from "../services/mathImages";
import type { ObjectPage, ObjectStore } from "../storage/objectStore";

interface MemoryObject {
  body: Buffer;
  contentType: string;
  lastModified: Date;
}

/**
 * Object store held in a Map. Pages are cut from the sorted key list and the
 * cursor is the offset of the next page. Every write is one second newer
 * than the previous one.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly location = "memory";
  readonly objects = new Map<string, MemoryObject>();
  listCalls = 0;
  private clock = Date.UTC(2025, 0, 1);

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    this.clock += 1000;
    this.objects.set(key, { body, contentType, lastModified: new Date(this.clock) });
  }

  async getObject(key: string): Promise<Buffer> {
    const object = this.objects.get(key);
    if (!object) throw new Error(`NoSuchKey: ${key}`);
    return object.body;
  }

  async listPage(prefix: string, cursor: string | undefined, pageSize: number): Promise<ObjectPage> {
    this.listCalls += 1;
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
    const start = cursor === undefined ? 0 : Number(cursor);
    const end = start + pageSize;
    return {
      objects: keys.slice(start, end).map((key) => {
        const object = this.objects.get(key);
        return {
          key,
          lastModified: object ? object.lastModified : new Date(0),
          sizeBytes: object ? object.body.length : 0,
        };
      }),
      nextCursor: end < keys.length ? String(end) : undefined,
    };
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    return `https://storage.test/${key}?expires=${expiresInSeconds}`;
  }

  text(key: string): string | undefined {
    return this.objects.get(key)?.body.toString("utf8");
  }
}

export class RecordingTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];
  failure?: Error;

  async sendMail(options: SendMailOptions): Promise<unknown> {
    if (this.failure) throw this.failure;
    this.sent.push(options);
    return { messageId: `<${this.sent.length}@test>` };
  }
}

export class StubLatexRenderer implements LatexImageRenderer {
  readonly rendered: string[] = [];

  constructor(private readonly failing: string[] = []) {}

  async render(latex: string): Promise<Buffer> {
    if (this.failing.includes(latex)) {
      throw new Error("render service unavailable");
    }
    this.rendered.push(latex);
    return Buffer.from(`png:${latex}`);
  }
}

export const FIXED_NOW = new Date("2025-06-26T14:03:09.000Z");

export const testSettings = {
  hostLabel: "test-host",
  timeZone: "UTC",
  maxEmbedded: 5,
  maxEmbeddedBytes: 8 * 1024 * 1024,
  listCeiling: 600,
};
