import { z } from 'zod';
import { toBlogResponseDto, type BlogResponseDto } from '../blogs/blog.dto';
import { toFileResponseDto, type FileResponseDto } from '../files/file.dto';
import type { Post, PostCategory } from './post.types';

// Multipart form fields arrive as strings. Lists may be sent as repeated fields,
// a JSON array, or a comma-separated string.
function formList(value: unknown): unknown {
  if (value == null) return undefined;
  if (Array.isArray(value)) return value.flatMap((v) => (typeof v === 'string' ? splitList(v) : [v]));
  if (typeof value === 'string') return splitList(value);
  return value;
}

function splitList(raw: string): unknown[] {
  const s = raw.trim();
  if (!s) return [];
  if (s.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(s);
      return Array.isArray(parsed) ? parsed : [parsed];
    } catch {
      return [s];
    }
  }
  return s
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

function formBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (!v) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return value;
}

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && !value.trim() ? undefined : value;
}

const idSchema = z.coerce.number().int().positive();

export const postRequestSchema = z.object({
  title: z.string().trim().min(1).max(300),
  content: z.string().max(10_000).optional().default(''),
  sensitive: z.preprocess(formBoolean, z.boolean().optional()),
  published: z.preprocess(formBoolean, z.boolean().optional()),
  postTags: z.preprocess(formList, z.array(z.string().max(64)).max(30).optional()),
  parentPostId: z.preprocess(blankToUndefined, idSchema.optional()),
  /** Retained attachment file ids in their new order. */
  attachments: z.preprocess(formList, z.array(idSchema).max(100).optional()),
  /** One insertion position per uploaded file. */
  attachmentInsertions: z.preprocess(formList, z.array(z.coerce.number().int().min(0)).optional()),
});

export type PostRequestDto = z.infer<typeof postRequestSchema>;

export const postListQuerySchema = z.object({
  blogNames: z.preprocess(formList, z.array(z.string()).max(50).optional()),
  tagNames: z.preprocess(formList, z.array(z.string()).max(50).optional()),
  category: z.string().trim().optional(),
});

export type PostListQuery = z.infer<typeof postListQuerySchema>;

export type PostResponseDto = {
  id: number;
  createdAt: string;
  updatedAt: string;
  title: string;
  content: string;
  sensitive: boolean;
  published: boolean;
  category: PostCategory;
  parentPostId: number | null;
  blog: BlogResponseDto;
  attachments: FileResponseDto[];
  postTags: string[];
};

export function toPostResponseDto(post: Post, publicAssetBaseUrl: string | null = null): PostResponseDto {
  return {
    id: post.id,
    createdAt: post.createdAt.toISOString(),
    updatedAt: post.updatedAt.toISOString(),
    title: post.title,
    content: post.content,
    sensitive: post.sensitive,
    published: post.published,
    category: post.category,
    parentPostId: post.parentPostId,
    blog: toBlogResponseDto(post.blog),
    attachments: post.attachments.map((f) => toFileResponseDto(f, publicAssetBaseUrl)),
    postTags: post.postTags.map((t) => t.name),
  };
}
