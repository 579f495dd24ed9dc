import { defineConfig } from 'vitest/config';

// Calendar days are local days. Run against a zone away from UTC, without
// daylight saving, so day boundaries differ from UTC ones in every test.
process.env.TZ = 'Asia/Kolkata';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        env: { TZ: 'Asia/Kolkata' },
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
        },
    },
});
