import { describeError } from '../errors.js'
import { runCompute } from '../etl/pipeline.js'
import { isEntryPoint } from '../helpers/entry-point.helper.js'
import { loadEtlConfig } from '../schema/etl-config.schema.js'

export async function main(run = runCompute): Promise<void> {
  console.log('Computing population by country...')

  try {
    const config = loadEtlConfig()
    await run(config)
    console.log(`Data computed and written to ${config.summaryOutputPath} successfully!`)
  } catch (error) {
    console.error('Population summary failed:', describeError(error))
    process.exit(1)
  }
}

if (isEntryPoint(import.meta.url)) {
  await main()
}
