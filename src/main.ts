#!/usr/bin/env node
import { NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { makeProgram } from "./cli/program.js"
import { colorStyle } from "./cli/format.js"
import { AppLive, withDataDir } from "./layers.js"

const program = makeProgram({
  makeLayer: (options) => withDataDir(AppLive, options.dataDir),
  output: {
    print: (text) => console.log(text),
    fail: (text) => {
      console.error(text)
      process.exitCode = 1
    }
  },
  style: colorStyle
})

Effect.promise(() => program.parseAsync(process.argv)).pipe(NodeRuntime.runMain)
