const ensureTestEnvironment = (): void => {
  // config/env.ts switches to fixed defaults under NODE_ENV=test
  process.env.NODE_ENV = "test";

  if (!process.env.LOG_LEVEL) {
    process.env.LOG_LEVEL = "silent";
  }
};

export default async function globalSetup(): Promise<void> {
  ensureTestEnvironment();
}
