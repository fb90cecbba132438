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
      // Покрытие считаем для доменного ядра и application-слоя (DI-wiring не включаем).
      include: ["src/recurrence/**/*.ts", "src/occasions/**/*.ts", "src/grid/**/*.ts", "src/domain/**/*.ts", "src/application/**/*.ts"],
      exclude: ["tests/**"],
      thresholds: {
        lines: 80,
        statements: 80,
        functions: 70,
        branches: 60,
      },
    },
  },
});
