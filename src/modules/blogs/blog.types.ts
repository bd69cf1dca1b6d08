export type Blog = {
  id: number;
  createdAt: Date;
  blogName: string;
  preferredBlogName: string;
  isPrivate: boolean;
  userId: number | null;
};

export type NewBlog = Omit<Blog, 'id' | 'createdAt'>;
