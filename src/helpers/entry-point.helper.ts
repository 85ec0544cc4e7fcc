import { pathToFileURL } from 'url'

// ES module equivalent of "require.main === module"
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1]
  return script !== undefined && moduleUrl === pathToFileURL(script).href
}
