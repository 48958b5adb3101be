import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    clearMocks: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      // Считаем покрытие для модулей без реального устройства и сети.
      include: ["src/**/*.ts"],
      exclude: ["tests/**", "src/recording/backends/ffmpegAudioSource.ts", "src/upload/s3RemoteStorage.ts"],
      thresholds: {
        lines: 60,
        statements: 60,
        functions: 50,
        branches: 40,
      },
    },
  },
});
