// ConfigModule validates process.env when AppModule is first imported.
process.env.API_KEYS_HASH_PEPPER ??= 'test-pepper-value-0123';
process.env.ADMIN_API_TOKEN ??= 'test-admin-token';
process.env.SYNTHESIS_PROVIDER ??= 'tone';
process.env.TTS_BACKEND_URL ??= 'http://127.0.0.1:5051';
process.env.REDIS_URL ??= 'redis://127.0.0.1:6379';
