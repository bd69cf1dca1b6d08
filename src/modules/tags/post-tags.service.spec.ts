import { InMemoryPostTagsRepository } from '../../../test/support/in-memory';
import { PostTagsService } from './post-tags.service';

function makeService() {
  const repo = new InMemoryPostTagsRepository();
  return { svc: new PostTagsService(repo), repo };
}

describe('PostTagsService', () => {
  it('findOrCreateByName reuses the tag across casing', async () => {
    const { svc, repo } = makeService();

    const a = await svc.findOrCreateByName('TypeScript');
    const b = await svc.findOrCreateByName('  typescript ');

    expect(a).toEqual({ id: 1, name: 'typescript' });
    expect(b).toEqual(a);
    expect(repo.tags.size).toBe(1);
  });

  it('findOrCreateByName ignores blank names', async () => {
    const { svc, repo } = makeService();

    expect(await svc.findOrCreateByName('  ')).toBeNull();
    expect(repo.tags.size).toBe(0);
  });

  it('findOrCreateAll dedupes and keeps first-seen order', async () => {
    const { svc } = makeService();
    await svc.findOrCreateByName('b');

    const tags = await svc.findOrCreateAll(['A', 'b', 'a', 'C']);

    expect(tags).toEqual([
      { id: 2, name: 'a' },
      { id: 1, name: 'b' },
      { id: 3, name: 'c' },
    ]);
  });

  it('getTags returns only existing tags and never creates', async () => {
    const { svc, repo } = makeService();
    await svc.findOrCreateAll(['news']);

    expect(await svc.getTags(['NEWS', 'missing'])).toEqual([{ id: 1, name: 'news' }]);
    expect(repo.tags.size).toBe(1);
  });
});
