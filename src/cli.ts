#!/usr/bin/env node
import { loadConfig } from './config.js'
import { Coordinator } from './coordinator.js'
import { describeEntities } from './entities.js'
import { wrapException } from './exceptions.js'
import { fatal } from './log.js'

// One refresh against the portal configured through INFOPOINT_* variables; prints the entities.
async function run() {
	const config = loadConfig()
	const coordinator = new Coordinator(config)

	try {
		const snapshot = await coordinator.refresh()
		console.log(JSON.stringify(describeEntities(snapshot, 'cli', config.timeZone), null, '\t'))
	} finally {
		coordinator.close()
	}
}

run().catch(e => {
	const exception = wrapException('cli', e)
	fatal(`${exception.name}: ${exception.message}`)
	process.exitCode = 1
})
