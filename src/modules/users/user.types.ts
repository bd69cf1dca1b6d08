export const USER_AUTHORITIES = ['POST_MANAGE', 'BLOG_MANAGE'] as const;

export type UserAuthority = (typeof USER_AUTHORITIES)[number];

export type User = {
  id: number;
  createdAt: Date;
  username: string;
  activeBlogId: number | null;
  authorities: UserAuthority[];
};

export function isUserAuthority(value: string): value is UserAuthority {
  return (USER_AUTHORITIES as readonly string[]).includes(value);
}
