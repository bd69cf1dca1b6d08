import { Injectable } from '@nestjs/common';
import { sql, type SQL } from 'drizzle-orm';
import { pageOffset, type PageRequest } from '../../common/pagination/page';
import { DatabaseService } from '../database/database.service';
import { PostSearchIndex, type PostSearchHits } from './post-search-index';

/** Max edit distance between a query term and a document word. */
export const SEARCH_MAX_EDIT_DISTANCE = 2;

const maxDistance = sql.raw(String(SEARCH_MAX_EDIT_DISTANCE));

function toInt(value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? Math.floor(n) : 0;
}

/**
 * Fuzzy word match over post title, content, blog names and tag names using
 * `fuzzystrmatch.levenshtein_less_equal`. Ranked by how many distinct terms matched,
 * newest first within a rank.
 */
@Injectable()
export class PostgresPostSearchIndex extends PostSearchIndex {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async search(terms: string[], page: PageRequest): Promise<PostSearchHits> {
    if (terms.length === 0) return { postIds: [], total: 0 };

    // A bare array param would be expanded into a list; build the ARRAY literal explicitly.
    const termArray = sql`ARRAY[${sql.join(
      terms.map((t) => sql`${t}`),
      sql`, `,
    )}]::text[]`;

    const result = await this.database.client().execute(sql`
      WITH terms AS (
        SELECT unnest(${termArray}) AS term
      ),
      docs AS (
        SELECT p.id, p.created_at,
          lower(concat_ws(' ', p.title, p.content, b.blog_name, b.preferred_blog_name,
            coalesce(string_agg(t.name, ' '), ''))) AS body
        FROM posts p
        JOIN blogs b ON b.id = p.blog_id
        LEFT JOIN post_post_tags ppt ON ppt.post_id = p.id
        LEFT JOIN post_tags t ON t.id = ppt.tag_id
        GROUP BY p.id, b.id
      ),
      words AS (
        SELECT DISTINCT d.id, w AS word
        FROM docs d, regexp_split_to_table(d.body, '[^[:alnum:]]+') AS w
        WHERE w <> '' AND length(w) <= 255
      ),
      hits AS (
        SELECT w.id, count(DISTINCT tm.term) AS matched
        FROM words w
        JOIN terms tm
          ON levenshtein_less_equal(w.word, tm.term, ${maxDistance}) <= ${maxDistance}
        GROUP BY w.id
      )
      SELECT h.id, (SELECT count(*) FROM hits) AS total
      FROM hits h
      JOIN docs d ON d.id = h.id
      ORDER BY h.matched DESC, d.created_at DESC, h.id DESC
      LIMIT ${page.size} OFFSET ${pageOffset(page)}
    `);

    const rows = result.rows;
    const postIds = rows.map((r) => toInt(r.id)).filter((id) => id > 0);
    const total = rows.length > 0 ? toInt(rows[0]?.total) : await this.count(termArray);
    return { postIds, total };
  }

  // Past the last page there are no rows to carry the total.
  private async count(termArray: SQL): Promise<number> {
    const result = await this.database.client().execute(sql`
      SELECT count(DISTINCT p.id) AS total
      FROM posts p
      JOIN blogs b ON b.id = p.blog_id
      LEFT JOIN post_post_tags ppt ON ppt.post_id = p.id
      LEFT JOIN post_tags t ON t.id = ppt.tag_id
      CROSS JOIN LATERAL regexp_split_to_table(
        lower(concat_ws(' ', p.title, p.content, b.blog_name, b.preferred_blog_name, t.name)),
        '[^[:alnum:]]+'
      ) AS w
      WHERE w <> '' AND length(w) <= 255
        AND EXISTS (
          SELECT 1 FROM unnest(${termArray}) AS tm(term)
          WHERE levenshtein_less_equal(w, tm.term, ${maxDistance}) <= ${maxDistance}
        )
    `);
    return toInt(result.rows[0]?.total);
  }
}
