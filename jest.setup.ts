process.env.LOG_LEVEL = "silent";
delete process.env.OPENAI_API_KEY;
delete process.env.REDIS_URL;
delete process.env.CLIENT_DIRECTORY_URL;
