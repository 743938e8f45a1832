/**
 * @description: Wraps binary attachments and packs them with a JSON payload into a multipart body.
 * @scope: core
 * @module: AttachmentPackager
 * @risk: moderate - Leaked file handles accumulate across interactions; every attachment must be released.
 */

import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { createModuleLogger } from '@slashkit/shared';
import type { ResponsePayload } from './payloadBuilder.js';

const attachmentLogger = createModuleLogger('attachments');

type AttachmentSource =
  | { kind: 'buffer'; data: Buffer }
  | { kind: 'file'; handle: FileHandle };

/**
 * A named binary part scoped to one outbound call. The caller opens it, the
 * packager reads it, and `withAttachments` closes it.
 */
export class InteractionAttachment {
  private released = false;

  private constructor(
    public readonly name: string,
    private readonly source: AttachmentSource,
    public readonly description?: string
  ) {}

  static fromBuffer(name: string, data: Buffer | Uint8Array | string, description?: string): InteractionAttachment {
    const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    return new InteractionAttachment(name, { kind: 'buffer', data: buffer }, description);
  }

  /**
   * Opens a file for reading. The handle stays open until `close()`.
   */
  static async fromPath(filePath: string, name?: string, description?: string): Promise<InteractionAttachment> {
    const handle = await open(filePath, 'r');
    return new InteractionAttachment(name ?? path.basename(filePath), { kind: 'file', handle }, description);
  }

  get closed(): boolean {
    return this.released;
  }

  async read(): Promise<Buffer> {
    if (this.released) {
      throw new Error(`Attachment ${this.name} was already released`);
    }
    if (this.source.kind === 'buffer') {
      return this.source.data;
    }
    return this.source.handle.readFile();
  }

  async close(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    if (this.source.kind === 'file') {
      await this.source.handle.close();
    }
  }
}

/**
 * Returns null when there is nothing to upload, so callers keep sending plain
 * JSON. Otherwise the payload goes in `payload_json` and each attachment in
 * `files[i]`, in input order.
 */
export async function packageAttachments(
  attachments: readonly InteractionAttachment[],
  payload: ResponsePayload
): Promise<FormData | null> {
  if (attachments.length === 0) {
    return null;
  }

  const form = new FormData();
  form.append('payload_json', JSON.stringify(payload));

  for (const [index, attachment] of attachments.entries()) {
    const data = await attachment.read();
    form.append(`files[${index}]`, new Blob([new Uint8Array(data)]), attachment.name);
  }

  return form;
}

/**
 * Closes every attachment. A failure to close one is logged and does not stop
 * the others from being released.
 */
export async function releaseAttachments(attachments: readonly InteractionAttachment[]): Promise<void> {
  const results = await Promise.allSettled(attachments.map((attachment) => attachment.close()));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      attachmentLogger.warn(`Failed to release attachment ${attachments[index]?.name ?? index}:`, result.reason);
    }
  });
}

/**
 * Runs an outbound operation and releases the attachments on every exit path.
 */
export async function withAttachments<T>(
  attachments: readonly InteractionAttachment[],
  operation: () => Promise<T>
): Promise<T> {
  try {
    return await operation();
  } finally {
    await releaseAttachments(attachments);
  }
}
