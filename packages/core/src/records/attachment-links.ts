/**
 * Xray embeds step attachments as wiki image links of the form
 * `!xray-attachment://<uuid>|width=300!`. The uuid is the attachment id
 * on the instance that produced the backup.
 */

export const ATTACHMENT_LINK_SCHEME = 'xray-attachment://';

const ATTACHMENT_LINK_PATTERN = /!xray-attachment:\/\/([a-f0-9-]+)(?:\|[^!]*)?!/g;

/** Extract attachment ids referenced from a block of step text, in order of appearance. */
export function extractAttachmentIds(text: string): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(ATTACHMENT_LINK_PATTERN)) {
    ids.push(match[1]);
  }
  return ids;
}
