import "dotenv/config";

function listEnvKeys(): string {
  return Object.keys(process.env)
    .filter((k) => !k.startsWith("npm_") && !k.startsWith("_"))
    .sort()
    .join(", ");
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    console.error(`FATAL: Missing required environment variable: ${name}`);
    // Names only, never values
    console.error(`   Available env var keys: ${listEnvKeys()}`);
    process.exit(1);
  }
  return value;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function numericEnv(name: string, defaultValue: number): number {
  const raw = optionalEnv(name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.error(`FATAL: ${name} must be a positive number, got "${raw}"`);
    process.exit(1);
  }
  return value;
}

console.log("[env] Loading environment variables...");

// Validate all required env vars upfront so we fail fast with a clear message
const requiredVars = ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY"];
const missing = requiredVars.filter((name) => !process.env[name]);
if (missing.length > 0) {
  console.error(`FATAL: Missing required environment variables: ${missing.join(", ")}`);
  console.error(`   Available env var keys: ${listEnvKeys()}`);
  process.exit(1);
}

export const env = {
  // Server
  port: numericEnv("PORT", 8080),
  nodeEnv: optionalEnv("NODE_ENV", "production"),
  isDev: optionalEnv("NODE_ENV", "production") === "development",

  // Uploads
  maxUploadBytes: numericEnv("MAX_UPLOAD_MB", 5) * 1024 * 1024,

  // Supabase
  supabaseUrl: requireEnv("SUPABASE_URL"),
  supabaseServiceRoleKey: requireEnv("SUPABASE_SERVICE_ROLE_KEY"),
} as const;

console.log(
  `[env] Loaded: PORT=${env.port}, NODE_ENV=${env.nodeEnv}, MAX_UPLOAD_MB=${env.maxUploadBytes / 1024 / 1024}`
);
