import { BadRequestException } from '@nestjs/common';

export type AttachmentSlot = { kind: 'existing'; fileId: number } | { kind: 'upload'; index: number };

export type AttachmentPlan = {
  /** Currently attached ids that are not retained, in current order. */
  removed: number[];
  /** Final attachment list, position i = slots[i]. */
  slots: AttachmentSlot[];
};

/**
 * Computes how a post's attachments change on update, without touching anything.
 *
 * An absent `retained` list retains nothing, so every current attachment is removed. Uploads are appended unless `insertions` gives one
 * position per upload; insertion i is applied after the previous ones, so its position may
 * range over 0..retained.length + i.
 */
export function planAttachments(params: {
  current: ReadonlyArray<number>;
  retained?: ReadonlyArray<number> | null;
  insertions?: ReadonlyArray<number> | null;
  uploads: number;
}): AttachmentPlan {
  const current = [...params.current];
  const retained = [...(params.retained ?? [])];
  const attached = new Set(current);

  const seen = new Set<number>();
  for (const id of retained) {
    if (!attached.has(id)) throw new BadRequestException(`File ${id} is not attached to this post.`);
    if (seen.has(id)) throw new BadRequestException(`File ${id} is listed more than once.`);
    seen.add(id);
  }

  const removed = current.filter((id) => !seen.has(id));
  const slots: AttachmentSlot[] = retained.map((fileId) => ({ kind: 'existing', fileId }));

  if (params.insertions == null) {
    for (let index = 0; index < params.uploads; index++) slots.push({ kind: 'upload', index });
    return { removed, slots };
  }

  if (params.insertions.length !== params.uploads) {
    throw new BadRequestException(
      `Expected ${params.uploads} attachment insertion position(s), got ${params.insertions.length}.`,
    );
  }
  params.insertions.forEach((pos, index) => {
    if (!Number.isInteger(pos) || pos < 0 || pos > slots.length) {
      throw new BadRequestException(`Attachment insertion position ${pos} is out of range 0..${slots.length}.`);
    }
    slots.splice(pos, 0, { kind: 'upload', index });
  });
  return { removed, slots };
}
