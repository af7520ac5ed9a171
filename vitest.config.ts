import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            REMOTE_API_URL: 'http://remote.test/api/records/create.json',
            REMOTE_API_TOKEN: 'test-token',
        },
    },
});
