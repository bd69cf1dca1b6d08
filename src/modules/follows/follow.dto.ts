import { z } from 'zod';
import { toBlogResponseDto, type BlogResponseDto } from '../blogs/blog.dto';
import type { Follow } from './follow.types';

export const followSettingsSchema = z.object({
  notificationsEnabled: z.boolean().optional(),
  muted: z.boolean().optional(),
});

export type FollowResponseDto = {
  id: number;
  createdAt: string;
  follower: BlogResponseDto;
  followee: BlogResponseDto;
  notificationsEnabled: boolean;
  muted: boolean;
};

export function toFollowResponseDto(follow: Follow): FollowResponseDto {
  return {
    id: follow.id,
    createdAt: follow.createdAt.toISOString(),
    follower: toBlogResponseDto(follow.follower),
    followee: toBlogResponseDto(follow.followee),
    notificationsEnabled: follow.notificationsEnabled,
    muted: follow.muted,
  };
}
