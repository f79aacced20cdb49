/**
 * Gateway configuration schemas
 */

import { z } from 'zod';

import { ConfigUtils, SIZE, TIME } from './utils.js';

export const HTTP_METHOD_NAMES = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

const httpUrl = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), { message: 'Target must be an http or https URL' });

/**
 * Listener settings
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  /** Time allowed to receive a whole request */
  read_timeout: ConfigUtils.durationTransformer().default(10 * TIME.SECOND),
  /** Keep-alive timeout for idle connections */
  idle_timeout: ConfigUtils.durationTransformer().default(30 * TIME.SECOND),
  max_header_bytes: ConfigUtils.sizeTransformer().default(1 * SIZE.MB),
  /** Upper bound for draining in-flight requests on shutdown */
  shutdown_timeout: ConfigUtils.durationTransformer().default(10 * TIME.SECOND),
});

export const RetryPolicyConfigSchema = z.object({
  base_delay: ConfigUtils.durationTransformer().default(1 * TIME.SECOND),
  max_attempts: z.number().int().min(1).default(3),
  max_backoff: ConfigUtils.durationTransformer().default(30 * TIME.SECOND),
});

/**
 * Route-level retry override; unset fields inherit the global policy
 */
export const RetryOverrideConfigSchema = z.object({
  base_delay: ConfigUtils.durationTransformer().optional(),
  max_attempts: z.number().int().min(1).optional(),
  max_backoff: ConfigUtils.durationTransformer().optional(),
});

export const UpstreamConfigSchema = z.object({
  /** Per-attempt transport timeout */
  request_timeout: ConfigUtils.durationTransformer().default(30 * TIME.SECOND),
  max_redirects: z.number().int().min(0).default(5),
  user_agent: z.string().min(1).default('Switchyard/1.0'),
});

export const CorsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  origins: z.array(z.string().min(1)).default(['*']),
  methods: z.array(z.enum(HTTP_METHOD_NAMES)).default(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS']),
  headers: z.array(z.string().min(1)).default(['Content-Type', 'Authorization']),
  max_age: z.number().int().min(0).optional(),
});

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(false),
  ttl: ConfigUtils.durationTransformer().default(1 * TIME.MINUTE),
});

export const RouteConfigSchema = z.object({
  path: z.string().startsWith('/', { message: 'Route path must start with "/"' }),
  target: httpUrl,
  methods: z
    .array(z.string().transform(method => method.toUpperCase()).pipe(z.enum(HTTP_METHOD_NAMES)))
    .min(1)
    .default(['GET']),
  /** Whole-call deadline including retries */
  timeout: ConfigUtils.durationTransformer().optional(),
  retry: RetryOverrideConfigSchema.optional(),
  cache: CacheConfigSchema.default({}),
  upstream_headers: z.record(z.string(), z.string()).default({}),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  format: z.enum(['text', 'json']).default('text'),
  colors: z.boolean().default(false),
});

export const GatewayConfigSchema = z
  .object({
    server: ServerConfigSchema.default({}),
    retry: RetryPolicyConfigSchema.default({}),
    upstream: UpstreamConfigSchema.default({}),
    cors: CorsConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
    routes: z.array(RouteConfigSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.routes.forEach((route, index) => {
      const path = route.path.replace(/\/+$/, '') || '/';
      if (seen.has(path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['routes', index, 'path'],
          message: `Duplicate route path: ${route.path}`,
        });
      }
      seen.add(path);
    });
  });

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type RetryPolicyConfig = z.infer<typeof RetryPolicyConfigSchema>;
export type RetryOverrideConfig = z.infer<typeof RetryOverrideConfigSchema>;
export type UpstreamConfig = z.infer<typeof UpstreamConfigSchema>;
export type CorsConfig = z.infer<typeof CorsConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type RouteConfig = z.infer<typeof RouteConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
