import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["{core,client,service}/src/**/*.test.ts"],
    environment: "node",
  },
});
