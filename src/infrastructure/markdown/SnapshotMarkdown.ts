import matter from 'gray-matter';
import { z } from 'zod';

/** snapshot / PROJECT.md 的 YAML frontmatter */
export interface SnapshotFrontmatter {
  project: string;
  sessionId: string;
  createdAt: string;
}

export interface ParsedSnapshotMarkdown {
  frontmatter: Partial<SnapshotFrontmatter>;
  body: string;
}

const FrontmatterSchema = z.object({
  project: z.coerce.string().optional(),
  session_id: z.coerce.string().optional(),
  // js-yaml 會把未加引號的 ISO 時間解析成 Date
  created_at: z.union([z.string(), z.date().transform((d) => d.toISOString())]).optional(),
});

/** 以 gray-matter 在 Markdown 本文前加上 frontmatter */
export function stringifySnapshotMarkdown(body: string, frontmatter: SnapshotFrontmatter): string {
  return matter.stringify(body, {
    project: frontmatter.project,
    session_id: frontmatter.sessionId,
    created_at: frontmatter.createdAt,
  });
}

/** 解析 frontmatter；欄位缺漏或型別不符時該欄位為 undefined */
export function parseSnapshotMarkdown(content: string): ParsedSnapshotMarkdown {
  const file = matter(content);
  const parsed = FrontmatterSchema.safeParse(file.data);
  if (!parsed.success) {
    return { frontmatter: {}, body: file.content };
  }
  return {
    frontmatter: {
      project: parsed.data.project,
      sessionId: parsed.data.session_id,
      createdAt: parsed.data.created_at,
    },
    body: file.content,
  };
}
