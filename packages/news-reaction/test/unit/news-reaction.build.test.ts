import fs from "fs/promises"
import { fileURLToPath } from "url"
import { describe, expect, test } from "vitest"

const root = (file: string) => fileURLToPath(new URL(`../../../../${file}`, import.meta.url))

async function readJSON(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(root(file), "utf8"))
}

describe("news reaction build", () => {
  test("emits JavaScript and declarations into dist", async () => {
    const pkg = await readJSON("package.json")
    const build = await readJSON("tsconfig.build.json")

    expect(pkg).toMatchObject({ scripts: { build: "tsc -p tsconfig.build.json", typecheck: "tsc --noEmit" } })
    expect(build).toMatchObject({
      extends: "./tsconfig.json",
      compilerOptions: { noEmit: false, outDir: "dist", declaration: true },
      exclude: ["packages/*/src/**/*.test.ts"],
    })
  })
})
