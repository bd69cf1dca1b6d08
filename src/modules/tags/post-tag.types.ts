export type PostTag = {
  id: number;
  name: string;
};
