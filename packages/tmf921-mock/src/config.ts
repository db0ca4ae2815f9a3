import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const mockConfigSchema = z.object({
  port: z
    .union([z.string(), z.number()])
    .default('8080')
    .transform((value) => {
      const num = typeof value === 'number' ? value : Number(value);
      return Number.isFinite(num) ? num : 8080;
    }),
  host: z.string().default('0.0.0.0'),
  logLevel: z
    .string()
    .default('info')
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])),
  // Static bearer token accepted in addition to tokens issued by /auth/token
  staticToken: optionalString,
  // When set, /auth/token checks the submitted credentials against these
  clientId: optionalString,
  clientSecret: optionalString,
  username: optionalString,
  password: optionalString,
  tokenTtlSeconds: z
    .union([z.string(), z.number()])
    .default('300')
    .transform((value) => {
      const num = typeof value === 'number' ? value : Number(value);
      return Number.isFinite(num) && num > 0 ? num : 300;
    }),
});

export type MockConfig = z.infer<typeof mockConfigSchema>;
export type MockConfigInput = z.input<typeof mockConfigSchema>;

export function parseMockConfig(input: MockConfigInput = {}): MockConfig {
  const parsed = mockConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid tmf921-mock configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadMockConfig(env: NodeJS.ProcessEnv = process.env): MockConfig {
  return parseMockConfig({
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    staticToken: env.MOCK_TMF921_TOKEN,
    clientId: env.MOCK_TMF921_CLIENT_ID,
    clientSecret: env.MOCK_TMF921_CLIENT_SECRET,
    username: env.MOCK_TMF921_USERNAME,
    password: env.MOCK_TMF921_PASSWORD,
    tokenTtlSeconds: env.MOCK_TMF921_TOKEN_TTL_SECONDS,
  });
}
