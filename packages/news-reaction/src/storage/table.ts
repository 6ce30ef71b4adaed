import fs from "fs/promises"
import path from "path"
import { DataType, Table as ArrowTable, TimeUnit, tableFromIPC, tableFromJSON, tableToIPC } from "apache-arrow"
import { TableFormatError } from "../finance/event-study/errors"
import type { RawTable } from "../finance/event-study/schema"

export namespace Table {
  export class NotFoundError extends Error {
    constructor(message: string) {
      super(message)
      this.name = "NotFoundError"
    }
  }

  export const FORMAT = ["arrow", "json"] as const
  export type Format = (typeof FORMAT)[number]

  const EXTENSIONS: Record<string, Format> = {
    ".arrow": "arrow",
    ".feather": "arrow",
    ".ipc": "arrow",
    ".json": "json",
  }

  export function formatOf(filepath: string): Format {
    const format = EXTENSIONS[path.extname(filepath).toLowerCase()]
    if (!format) {
      throw new TableFormatError(`Unsupported table format: ${filepath}`, {
        path: filepath,
        supported: Object.keys(EXTENSIONS),
      })
    }
    return format
  }

  function isRecord(value: unknown): value is Record<string, unknown> {
    return !!value && typeof value === "object" && !Array.isArray(value)
  }

  function columnsOf(rows: readonly Record<string, unknown>[]) {
    const columns = new Set<string>()
    rows.forEach((row) => Object.keys(row).forEach((key) => columns.add(key)))
    return [...columns]
  }

  function decodeJSON(name: string, text: string): RawTable {
    let value: unknown
    try {
      value = JSON.parse(text)
    } catch (error) {
      throw new TableFormatError(`Table '${name}' is not valid JSON`, {
        table: name,
        cause: error instanceof Error ? error.message : String(error),
      })
    }

    // either an array of records, or { columns, rows } so empty tables keep their schema
    const rows = Array.isArray(value) ? value : isRecord(value) ? value.rows : undefined
    if (!Array.isArray(rows) || !rows.every(isRecord)) {
      throw new TableFormatError(`Table '${name}' must be a JSON array of records`, { table: name })
    }
    const declared = isRecord(value) && Array.isArray(value.columns) ? value.columns.map(String) : []
    return {
      name,
      columns: [...new Set([...declared, ...columnsOf(rows)])],
      rows,
    }
  }

  function fromIPC(name: string, bytes: Uint8Array) {
    try {
      return tableFromIPC(bytes)
    } catch (error) {
      throw new TableFormatError(`Table '${name}' is not a valid Arrow IPC file`, {
        table: name,
        cause: error instanceof Error ? error.message : String(error),
      })
    }
  }

  function epochMillis(value: number | bigint, unit: TimeUnit) {
    if (typeof value === "number") return value
    if (unit === TimeUnit.SECOND) return Number(value) * 1000
    if (unit === TimeUnit.MICROSECOND) return Number(value / 1_000n)
    if (unit === TimeUnit.NANOSECOND) return Number(value / 1_000_000n)
    return Number(value)
  }

  /** Zone-less timestamp columns hold wall-clock time; emit them as naive `YYYY-MM-DDTHH:MM:SS.sss`. */
  function wallClock(value: unknown, unit: TimeUnit) {
    if (typeof value !== "number" && typeof value !== "bigint") return value
    return new Date(epochMillis(value, unit)).toISOString().slice(0, 23)
  }

  function decodeArrow(name: string, bytes: Uint8Array): RawTable {
    const table = fromIPC(name, bytes)
    const naive = table.schema.fields.flatMap((field) =>
      DataType.isTimestamp(field.type) && !field.type.timezone ? [{ name: field.name, unit: field.type.unit }] : [],
    )
    return {
      name,
      columns: table.schema.fields.map((field) => field.name),
      rows: table.toArray().map((row): Record<string, unknown> => {
        const record: Record<string, unknown> = { ...row.toJSON() }
        for (const column of naive) record[column.name] = wallClock(record[column.name], column.unit)
        return record
      }),
    }
  }

  export function decode(name: string, format: Format, bytes: Uint8Array): RawTable {
    if (format === "json") return decodeJSON(name, new TextDecoder().decode(bytes))
    return decodeArrow(name, bytes)
  }

  export async function read(name: string, filepath: string): Promise<RawTable> {
    const format = formatOf(filepath)
    const bytes = await fs.readFile(filepath).catch((error) => {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new NotFoundError(`Input table '${name}' not found: ${filepath}`)
      }
      throw error
    })
    return decode(name, format, bytes)
  }

  export function toRecord(row: object): Record<string, unknown> {
    return Object.fromEntries(Object.entries(row))
  }

  export function encode(format: Format, rows: readonly object[]): string | Uint8Array {
    const records = rows.map(toRecord)
    if (format === "json") return `${JSON.stringify(records, null, 2)}\n`
    const table = records.length === 0 ? new ArrowTable() : tableFromJSON(records)
    return tableToIPC(table, "file")
  }
}
