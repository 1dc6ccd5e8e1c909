/**
 * Attachments - Files and images sent alongside a prompt
 *
 * Attachments become extra user messages placed before the prompt: one
 * message with every image, then one with every PDF. The prompt message
 * itself is never replaced.
 */

import type { ContentPart, UserMessage } from '@shared/index.js';

export interface FileAttachment {
  /** data: URI carrying the base64 payload */
  dataUri: string;
  name: string;
}

function toDataUri(mimeType: string, content: Uint8Array): string {
  return `data:${mimeType};base64,${Buffer.from(content).toString('base64')}`;
}

export function filePdf(name: string, content: Uint8Array): FileAttachment {
  return { name, dataUri: toDataUri('application/pdf', content) };
}

export function filePng(name: string, content: Uint8Array): FileAttachment {
  return { name, dataUri: toDataUri('image/png', content) };
}

export function fileFromDataUri(name: string, dataUri: string): FileAttachment {
  return { name, dataUri };
}

/**
 * Build the user messages that carry attachments
 *
 * Attachments that are neither PDF nor image are ignored, as the endpoint
 * has no content part for them.
 */
export function buildAttachmentMessages(files: readonly FileAttachment[]): UserMessage[] {
  const images: ContentPart[] = [];
  const documents: ContentPart[] = [];

  for (const file of files) {
    if (file.dataUri.includes('/pdf')) {
      documents.push({ type: 'file', file: { file_data: file.dataUri, filename: file.name } });
    } else if (file.dataUri.includes('image/')) {
      images.push({ type: 'image_url', image_url: { url: file.dataUri } });
    }
  }

  const messages: UserMessage[] = [];
  if (images.length > 0) {
    messages.push({ role: 'user', content: images });
  }
  if (documents.length > 0) {
    messages.push({ role: 'user', content: documents });
  }
  return messages;
}
