import { describeError } from '../errors.js'
import { runExport } from '../etl/pipeline.js'
import { isEntryPoint } from '../helpers/entry-point.helper.js'
import { loadEtlConfig } from '../schema/etl-config.schema.js'

export async function main(run = runExport): Promise<void> {
  console.log('Starting load and export...')

  try {
    const config = loadEtlConfig()
    const result = await run(config)

    result.dumps.forEach((dump) => {
      console.log(`  ${dump.table}: ${dump.rows} rows -> ${dump.outputPath}`)
    })
    console.log('Export completed successfully!')
  } catch (error) {
    console.error('Export failed:', describeError(error))
    process.exit(1)
  }
}

if (isEntryPoint(import.meta.url)) {
  await main()
}
