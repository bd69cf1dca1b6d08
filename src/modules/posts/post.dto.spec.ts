import { postListQuerySchema, postRequestSchema } from './post.dto';

describe('postRequestSchema', () => {
  it('parses multipart form fields', () => {
    const parsed = postRequestSchema.parse({
      title: '  Hi  ',
      sensitive: 'true',
      published: 'off',
      postTags: '["x","y"]',
      parentPostId: '',
      attachments: '3, 1',
      attachmentInsertions: ['0', '2'],
    });

    expect(parsed).toEqual({
      title: 'Hi',
      content: '',
      sensitive: true,
      published: false,
      postTags: ['x', 'y'],
      parentPostId: undefined,
      attachments: [3, 1],
      attachmentInsertions: [0, 2],
    });
  });

  it('accepts an explicit empty attachment list', () => {
    expect(postRequestSchema.parse({ title: 't', attachments: '' }).attachments).toEqual([]);
  });

  it('rejects a blank title and non-positive file ids', () => {
    expect(postRequestSchema.safeParse({ title: '   ' }).success).toBe(false);
    expect(postRequestSchema.safeParse({ title: 't', attachments: '0' }).success).toBe(false);
  });

  it('rejects unrecognised booleans', () => {
    expect(postRequestSchema.safeParse({ title: 't', sensitive: 'maybe' }).success).toBe(false);
  });
});

describe('postListQuerySchema', () => {
  it('splits repeated and comma-separated names', () => {
    expect(postListQuerySchema.parse({ blogNames: ['alice,bob', 'carol'], tagNames: 'art' })).toEqual({
      blogNames: ['alice', 'bob', 'carol'],
      tagNames: ['art'],
    });
  });
});
