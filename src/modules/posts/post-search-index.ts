import type { PageRequest } from '../../common/pagination/page';

export type PostSearchHits = {
  /** Best match first. */
  postIds: number[];
  total: number;
};

export abstract class PostSearchIndex {
  abstract search(terms: string[], page: PageRequest): Promise<PostSearchHits>;
}
