#!/usr/bin/env node
import { createProgram, parseOptions, runDemo } from "./demo.js"
import { createRenderer } from "./rendering/index.js"
import type { CliRenderer } from "./rendering/types.js"
import { getErrorMessage, isCancellationError } from "./utils/cancel.js"

interface SigintCancellationHandle {
  signal: AbortSignal
  dispose: () => void
}

const setupSigintCancellation = (renderer: CliRenderer): SigintCancellationHandle => {
  const controller = new AbortController()
  let sigintCount = 0
  const onSigint = () => {
    sigintCount += 1
    if (sigintCount === 1) {
      renderer.warn("\nInterrupted (CTRL+C). Stopping pagination...")
      controller.abort(new Error("Interrupted by user (SIGINT)"))
      return
    }
    renderer.error("Force exit requested.")
    process.exit(130)
  }
  process.on("SIGINT", onSigint)
  return {
    signal: controller.signal,
    dispose: () => process.off("SIGINT", onSigint),
  }
}

const main = async (): Promise<number> => {
  const program = createProgram()
  const rawArgs = process.argv.slice(2)
  const normalizedArgs = rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs
  program.parse(["node", "pagewise", ...normalizedArgs])
  const options = parseOptions(program)
  const renderer = createRenderer(options.plain ? "plain" : "interactive")
  const { signal, dispose } = setupSigintCancellation(renderer)

  try {
    return await runDemo(options, renderer, signal)
  } catch (error) {
    if (signal.aborted && isCancellationError(error)) {
      renderer.warn("Run cancelled by user.")
      return 130
    }
    throw error
  } finally {
    dispose()
  }
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    if (isCancellationError(error)) {
      console.error("Run cancelled by user.")
      process.exit(130)
    }
    console.error(`Unexpected error: ${getErrorMessage(error)}`)
    process.exit(1)
  })
