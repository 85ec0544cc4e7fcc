import { describeError } from '../errors.js'
import { runLoad } from '../etl/pipeline.js'
import { isEntryPoint } from '../helpers/entry-point.helper.js'
import { loadEtlConfig } from '../schema/etl-config.schema.js'

export async function main(run = runLoad): Promise<void> {
  console.log('Starting data load...')

  try {
    const config = loadEtlConfig()
    const { places, people } = await run(config)
    console.log(`Data inserted successfully! (${places} places, ${people} people)`)
  } catch (error) {
    console.error('Data load failed:', describeError(error))
    process.exit(1)
  }
}

if (isEntryPoint(import.meta.url)) {
  await main()
}
