import fsp from 'fs/promises'
import path from 'path'

/**
 * Write `value` as pretty JSON through a hidden `.partial` file and a rename,
 * so readers never see a half-written record.
 */
export async function writeJsonAtomic(filePath: string, value: unknown) {
  const dir = path.dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tmp = path.join(dir, `.${path.basename(filePath)}.partial`)
  await fsp.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf8')
  await fsp.rename(tmp, filePath)
}
