import boxen from "boxen"
import chalk from "chalk"
import Table from "cli-table3"
import ora, { type Ora } from "ora"

import type { PaginatorState } from "../paginator/state.js"
import type { FetchOutcome } from "../sources/in-memory-source.js"
import { describeState } from "./format.js"
import type { CliRenderer, RunSettings, RunSummary } from "./types.js"

const OUTCOME_LABELS: Record<FetchOutcome, string> = {
  ok: chalk.green("ok"),
  failed: chalk.red("failed"),
  cancelled: chalk.yellow("cancelled"),
}

export class InteractiveRenderer implements CliRenderer {
  private spinner: Ora | null = null

  header(settings: RunSettings): void {
    const body = [
      `${chalk.bold("Page size")}   ${settings.pageSize}`,
      `${chalk.bold("Pages")}       ${settings.defaultPage}..${settings.maxPage - 1}`,
      `${chalk.bold("Items")}       ${settings.totalItems}`,
      `${chalk.bold("Latency")}     ${settings.latencyMs}ms`,
      `${chalk.bold("Scrolls")}     ${settings.scrolls}`,
    ].join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold("Paginator Demo"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  snapshot(state: PaginatorState<unknown>): void {
    const text = describeState(state)
    if (state.isLoading) {
      if (this.spinner) {
        this.spinner.text = text
      } else {
        this.spinner = ora(text).start()
      }
      return
    }
    const spinner = this.spinner
    this.spinner = null
    if (!spinner) {
      console.log(chalk.dim(text))
    } else if (state.error !== null) {
      spinner.fail(text)
    } else if (state.maximumReached) {
      spinner.warn(text)
    } else {
      spinner.succeed(text)
    }
  }

  errorToast(message: string): void {
    this.spinner?.stop()
    console.log(chalk.red(`✖ ${message}`))
  }

  summary(summary: RunSummary): void {
    this.spinner?.stop()
    this.spinner = null
    const { state } = summary
    console.log(
      boxen(
        [
          `${chalk.bold("Items")}    ${state.items.length}`,
          `${chalk.bold("Page")}     ${state.currentPage}`,
          `${chalk.bold("Max")}      ${state.maximumReached ? chalk.yellow("reached") : "not reached"}`,
        ].join("\n"),
        {
          title: chalk.green("Run Complete"),
          borderColor: "green",
          padding: 1,
        },
      ),
    )

    const table = new Table({
      head: [chalk.bold("Page"), chalk.bold("Size"), chalk.bold("Items"), chalk.bold("Outcome")],
    })
    for (const fetch of summary.fetches) {
      table.push([fetch.page, fetch.pageSize, fetch.count, OUTCOME_LABELS[fetch.outcome]])
    }
    console.log(table.toString())
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    this.spinner?.stop()
    console.error(chalk.red(message))
  }
}
