import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'physics': resolveFromRoot('src/physics'),
            'util': resolveFromRoot('src/util'),
            'config': resolveFromRoot('src/config'),
            'cli': resolveFromRoot('src/cli'),
            'types': resolveFromRoot('src/types'),
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        clearMocks: true,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['src/**/*.ts'],
        },
    },
});
