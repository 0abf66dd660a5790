import { LOG_LEVELS } from '@vigil/shared';
import { z } from 'zod';

const monitorServiceEnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']),
    HOST: z.string().min(1),
    PORT: z.string().regex(/^\d+$/).transform(Number),
    LOG_LEVEL: z.enum(LOG_LEVELS),
    VIGIL_MONITORS_FILE: z.string().min(1),
    VIGIL_STATE_FILE: z.string().min(1),
    VIGIL_SERVICE_TOKEN: z.string().min(16),
    VIGIL_TICK_INTERVAL_MS: z.string().regex(/^\d+$/).transform(Number),
    VIGIL_NOTIFY_WEBHOOK_URL: z.string().url().optional(),
    VIGIL_NOTIFY_WEBHOOK_SECRET: z.string().min(16).optional(),
  })
  .superRefine((env, context) => {
    if ((env.VIGIL_NOTIFY_WEBHOOK_URL === undefined) !== (env.VIGIL_NOTIFY_WEBHOOK_SECRET === undefined)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['VIGIL_NOTIFY_WEBHOOK_SECRET'],
        message: 'VIGIL_NOTIFY_WEBHOOK_URL and VIGIL_NOTIFY_WEBHOOK_SECRET must be set together',
      });
    }
  });

export type MonitorServiceConfig = z.infer<typeof monitorServiceEnvSchema>;

export function loadMonitorServiceConfig(
  source: NodeJS.ProcessEnv = process.env,
): MonitorServiceConfig {
  try {
    return monitorServiceEnvSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issueText = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Configuration errors: ${issueText}`);
    }

    throw error;
  }
}
