import { z } from 'zod';
import { BACKENDS, RequestValidationError } from '../types';

const officialCredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  privateSecret: z.string().min(1),
  accessToken: z.string().optional(),
  refreshToken: z.string().optional(),
  apiDomain: z.string().optional(),
});

const credentialsSchema = z.object({
  cookie: z.string().optional(),
  apiKey: z.string().optional(),
  password: z.string().optional(),
  official: officialCredentialsSchema.optional(),
});

export const extractBodySchema = z.object({
  url: z.string().trim().min(1, 'Missing required field: url'),
  backend: z.enum(BACKENDS),
  credentials: credentialsSchema.optional(),
  forceRefresh: z.boolean().optional(),
});

export function batchExtractBodySchema(maxUrls: number) {
  return z.object({
    urls: z
      .array(z.string().trim().min(1, 'URLs must not be empty'))
      .min(1, 'At least one URL is required')
      .max(maxUrls, `At most ${maxUrls} URLs per batch`),
    backend: z.enum(BACKENDS),
    credentials: credentialsSchema.optional(),
    forceRefresh: z.boolean().optional(),
  });
}

export const apiKeyBodySchema = z.object({
  apiKey: z.string().trim().min(1, 'Missing required field: apiKey'),
});

export const cookieBodySchema = z.object({
  cookie: z.string().trim().min(1, 'Missing required field: cookie'),
});

export const authContextSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('scrape'),
    uk: z.string(),
    shareId: z.string(),
    sign: z.string(),
    timestamp: z.string(),
    jsToken: z.string(),
    browserId: z.string(),
    cookie: z.string(),
  }),
  z.object({
    kind: z.literal('cookie'),
    uk: z.string(),
    shareId: z.string(),
    directLinks: z.record(z.string()),
  }),
  z.object({
    kind: z.literal('relay'),
    uk: z.string(),
    shareId: z.string(),
    sign: z.string(),
    timestamp: z.string(),
  }),
  z.object({
    kind: z.literal('official'),
    accessToken: z.string(),
    apiDomain: z.string(),
    uk: z.string(),
    shareId: z.string(),
    sekey: z.string(),
  }),
  z.object({
    kind: z.literal('commercial'),
    links: z.record(z.object({ direct: z.string(), download: z.string() })),
  }),
]);

export const linksBodySchema = z.object({
  remoteId: z.union([z.string().min(1), z.number()]).transform(String),
  auth: authContextSchema,
});

/** Validate a request body, failing with a 400 that names the first bad field. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new RequestValidationError(field ? `Invalid field "${field}": ${issue.message}` : issue.message);
  }
  return parsed.data;
}
