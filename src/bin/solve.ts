import { main } from '../cli'
import { logError } from '../lib/errorUtils'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    logError('solve', err)
    process.exitCode = 1
  })
