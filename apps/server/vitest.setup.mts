/**
 * Vitest setup file - runs before each test file
 */
process.env.DATABASE_PATH ||= ":memory:";
process.env.LOG_LEVEL ||= "silent";
process.env.UPLOAD_DIR ||= "./.test-uploads";
process.env.AUTO_VERIFICATION_ENABLED ||= "true";
