/**
 * Application configuration loaded from config/analysis.json
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { daysToSeconds, hoursToSeconds } from './time';

export interface CacheTtlConfig {
  shortLivedSeconds: number;
  slowMovingSeconds: number;
}

export interface AppConfig {
  defaultProfile: string;
  cacheTtl: CacheTtlConfig;
  newsMaxResults: number;
  projectRoot: string;
}

const DEFAULTS = {
  defaultProfile: 'default',
  shortLivedSeconds: hoursToSeconds(1),
  slowMovingSeconds: daysToSeconds(1),
  newsMaxResults: 5,
};

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function normalizeConfig(raw: unknown, projectRoot: string): AppConfig {
  const parsed = isRecord(raw) ? raw : {};
  const ttl = isRecord(parsed.cache_ttl) ? parsed.cache_ttl : {};

  return {
    defaultProfile:
      typeof parsed.default_profile === 'string' && parsed.default_profile.trim() !== ''
        ? parsed.default_profile.trim()
        : DEFAULTS.defaultProfile,
    cacheTtl: {
      shortLivedSeconds: positiveNumber(ttl.short_lived_seconds, DEFAULTS.shortLivedSeconds),
      slowMovingSeconds: positiveNumber(ttl.slow_moving_seconds, DEFAULTS.slowMovingSeconds),
    },
    newsMaxResults: Math.floor(positiveNumber(parsed.news_max_results, DEFAULTS.newsMaxResults)),
    projectRoot,
  };
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();
  const configPath = join(projectRoot, 'config', 'analysis.json');

  if (!existsSync(configPath)) {
    return normalizeConfig({}, projectRoot);
  }
  const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
  return normalizeConfig(raw, projectRoot);
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
