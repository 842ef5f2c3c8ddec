import { z } from 'zod';

function isCalendarDate(day: string): boolean {
  const parsed = new Date(`${day}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === day;
}

/**
 * Calendar date of publication. Accepts `YYYY-MM-DD` or a full ISO timestamp
 * and keeps only the date part.
 */
export const PublicationDateSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const day = /^(\d{4}-\d{2}-\d{2})/.exec(value)?.[1];
    if (!day || !isCalendarDate(day)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a YYYY-MM-DD date' });
      return z.NEVER;
    }
    return day;
  });

// Numbers, or digit strings as some models quote them.
export const RatingSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(1).max(10));

// Unknown keys (including any rating the research step invents) are stripped.
export const NewsItemSchema = z.object({
  title: z.string().trim().min(1),
  summary: z.string().trim(),
  url: z.string().trim().min(1),
  publication_date: PublicationDateSchema,
});

export const RatedNewsItemSchema = NewsItemSchema.extend({
  rating: RatingSchema,
});

export const NewsReportSchema = z.object({
  news_items: z.array(NewsItemSchema),
});

export const RatedNewsReportSchema = z.object({
  news_items: z.array(RatedNewsItemSchema),
});

export type NewsItem = z.infer<typeof NewsItemSchema> & { rating?: number };
export type RatedNewsItem = z.infer<typeof RatedNewsItemSchema>;
export type NewsReport = z.infer<typeof NewsReportSchema>;
export type RatedNewsReport = z.infer<typeof RatedNewsReportSchema>;
