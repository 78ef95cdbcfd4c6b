import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { EVENT_KINDS } from '../../domain/index.js';
import type { EventKind } from '../../domain/index.js';
import { DEFAULT_FALLBACK_POLICY, isFallbackMode } from '../../application/index.js';
import type { FallbackMode, FallbackPolicy } from '../../application/index.js';

/**
 * Notification settings loaded from YAML.
 */
export interface NotificationConfig {
  fallback: FallbackPolicy;
}

export const DEFAULT_CONFIG: NotificationConfig = {
  fallback: DEFAULT_FALLBACK_POLICY,
};

const documentSchema = z
  .object({
    fallback: z.record(z.string(), z.unknown()).nullish(),
  })
  .passthrough()
  .nullish();

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing, unreadable or not
 * valid YAML.
 * Kinds that are absent or carry an unknown mode keep their default.
 */
export function loadNotificationConfig(configPath?: string): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  const parsed = documentSchema.safeParse(document);
  const section = parsed.success ? (parsed.data?.fallback ?? {}) : {};
  const fallback = Object.fromEntries(
    EVENT_KINDS.map((kind): [EventKind, FallbackMode] => {
      const value = section[kind];
      return [kind, isFallbackMode(value) ? value : DEFAULT_FALLBACK_POLICY[kind]];
    }),
  );

  return { fallback: { ...DEFAULT_FALLBACK_POLICY, ...fallback } };
}
