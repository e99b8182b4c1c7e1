import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, getJson } from '../core/http.js';
import type { Article } from '../core/types.js';
import { articleSchema, parseWith } from '../core/validation.js';

export interface NewsClient {
  /** Recent articles for a topic, newest first. `query` defaults to the topic itself. */
  fetchRecent(topic: string, query?: string): Promise<Article[]>;
}

const newsApiArticleSchema = z.object({
  source: z.object({ id: z.string().nullable().optional(), name: z.string().nullable().optional() }).optional(),
  title: z.string().nullable(),
  description: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  publishedAt: z.string()
});

const newsApiResponseSchema = z.object({
  status: z.string(),
  totalResults: z.number().optional(),
  articles: z.array(z.unknown())
});

export type NewsApiArticle = z.infer<typeof newsApiArticleSchema>;

const REMOVED_MARKER = '[Removed]';

/** Maps one NewsAPI item; returns null for removed or unusable entries. */
export const toArticle = (topic: string, raw: unknown): Article | null => {
  const item = newsApiArticleSchema.safeParse(raw);
  if (!item.success) return null;
  const { title, url, description, source, publishedAt } = item.data;
  if (!title || title === REMOVED_MARKER) return null;
  const article = articleSchema.safeParse({
    id: url || `${topic}:${publishedAt}:${title}`,
    topic,
    title,
    summary: description ?? undefined,
    url: url ?? undefined,
    source: source?.name ?? undefined,
    publishedAt: Date.parse(publishedAt)
  });
  return article.success ? article.data : null;
};

export interface NewsApiOptions {
  apiKey: string;
  baseUrl?: string;
  /** Default: 10 */
  pageSize?: number;
  /** Default: 10000 */
  timeoutMs?: number;
}

/** NewsAPI `/v2/everything`, English, newest first. */
export class NewsApiClient implements NewsClient {
  private readonly http: AxiosInstance;
  private readonly pageSize: number;

  constructor(options: NewsApiOptions, http?: AxiosInstance) {
    this.pageSize = options.pageSize ?? 10;
    this.http =
      http ?? createHttpClient(options.baseUrl ?? 'https://newsapi.org', options.timeoutMs ?? 10000, { 'X-Api-Key': options.apiKey });
  }

  async fetchRecent(topic: string, query: string = topic): Promise<Article[]> {
    const raw = await getJson(this.http, '/v2/everything', `newsapi ${topic}`, {
      q: query,
      language: 'en',
      sortBy: 'publishedAt',
      pageSize: this.pageSize
    });
    const body = parseWith(newsApiResponseSchema, raw, 'newsapi response');
    const out: Article[] = [];
    for (const item of body.articles) {
      const article = toArticle(topic, item);
      if (article) out.push(article);
    }
    return out;
  }
}
