import fs from "fs/promises"
import path from "path"

type WriteArtifactsInput = {
  outputRoot: string
  files: Record<string, string | Uint8Array>
  /** Move files that would be overwritten into `history/<stamp>/` first. */
  archive?: boolean
  now?: Date
}

function stampForPath(now: Date) {
  return now.toISOString().replace(/[:.]/g, "-")
}

async function exists(filepath: string) {
  return fs
    .stat(filepath)
    .then(() => true)
    .catch((error) => {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return false
      throw error
    })
}

async function archiveExistingArtifacts(outputRoot: string, paths: string[], now: Date) {
  const existing: string[] = []
  for (const filepath of paths) {
    if (await exists(filepath)) existing.push(filepath)
  }
  if (existing.length === 0) return undefined

  const historyRoot = path.join(outputRoot, "history", stampForPath(now))
  await fs.mkdir(historyRoot, { recursive: true })
  await Promise.all(existing.map((filepath) => fs.rename(filepath, path.join(historyRoot, path.basename(filepath)))))
  return historyRoot
}

export async function writeArtifacts(input: WriteArtifactsInput) {
  const filePaths = Object.entries(input.files).map(([filename, content]) => ({
    filename,
    path: path.join(input.outputRoot, filename),
    content,
  }))

  await fs.mkdir(input.outputRoot, { recursive: true })
  const archived = input.archive
    ? await archiveExistingArtifacts(
        input.outputRoot,
        filePaths.map((entry) => entry.path),
        input.now ?? new Date(),
      )
    : undefined

  try {
    await Promise.all(filePaths.map((entry) => fs.writeFile(entry.path, entry.content)))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed writing artifacts to ${input.outputRoot}: ${message}`)
  }

  return {
    paths: Object.fromEntries(filePaths.map((entry) => [entry.filename, entry.path])),
    archived,
  }
}
