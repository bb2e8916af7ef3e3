import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "node",
    environment: "node",
    include: ["src/**/*test.?(c|m)[jt]s?(x)"],
  },
});
