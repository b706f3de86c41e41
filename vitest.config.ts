import { defineConfig, defineProject } from "vitest/config"
import { fileURLToPath } from "node:url"

const alias = {
  "@handoff/callable": fileURLToPath(
    new URL(`./packages/callable/src/index.ts`, import.meta.url)
  ),
  "@handoff/future": fileURLToPath(
    new URL(`./packages/future/src/index.ts`, import.meta.url)
  ),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: "callable",
          include: ["packages/callable/**/*.test.ts"],
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: "future",
          include: ["packages/future/**/*.test.ts"],
        },
        resolve: { alias },
      }),
    ],
    coverage: {
      provider: `v8`,
      reporter: [`text`, `json`, `html`],
    },
  },
})
