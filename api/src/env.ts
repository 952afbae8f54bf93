// api/src/env.ts
import "dotenv/config";

function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) {
    console.error(`❌ Missing required environment variable: ${name}`);
    console.error(`📋 Available env vars starting with ${name.slice(0, 3)}: ${Object.keys(process.env).filter(k => k.startsWith(name.slice(0, 3))).join(', ') || 'none'}`);
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

console.log('🔧 Loading environment configuration...');

const rawWebOrigin =
  process.env.WEB_ORIGIN ||
  process.env.ALLOWED_ORIGINS ||
  ["http://localhost:3000", "http://127.0.0.1:3000"].join(",");

const parsedWebOrigin = rawWebOrigin
  .split(",")
  .map((s) => s.trim())
  .filter(Boolean);

export const env = {
  NODE_ENV: process.env.NODE_ENV ?? "development",
  PORT: Number(process.env.PORT ?? 4000),
  DATABASE_URL: requireEnv("DATABASE_URL"),
  PG_POOL_MAX: Math.max(1, Number(process.env.PG_POOL_MAX ?? 10)),

  // Web origins allowlist for CORS
  WEB_ORIGIN: parsedWebOrigin,
} as const;

console.log('✅ Environment configuration loaded successfully');
console.log(`📡 PORT: ${env.PORT}`);
console.log(`🌐 WEB_ORIGIN: ${env.WEB_ORIGIN.join(', ')}`);
console.log(`🗄️ PG pool size: ${env.PG_POOL_MAX}`);
