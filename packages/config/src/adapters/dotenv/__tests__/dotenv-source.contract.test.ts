import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  make: async (cwd) => new DotenvSource({ file: ".env", required: true, cwd }),
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "MAX_MESSAGE_BYTES=4096\n")
  },
  expectedValue: () => ({ MAX_MESSAGE_BYTES: "4096" }),
})
