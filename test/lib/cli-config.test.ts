import { expect } from 'chai'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { CliConfigurator, LOCAL_CONFIG_FILE } from '../../src/lib/cli-config.js'
import { ConfigurationError } from '../../src/lib/errors.js'

describe('lib/cli-config', () => {
  const originalCwd = process.cwd()
  let tempDir: string
  let homeConfig: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'grist-cli-config-'))
    homeConfig = join(tempDir, 'home.json')
    process.chdir(tempDir)
  })

  afterEach(() => {
    process.chdir(originalCwd)
    rmSync(tempDir, { force: true, recursive: true })
  })

  it('defaults the timeout to 60 seconds', () => {
    const configurator = new CliConfigurator(undefined, { configPath: homeConfig, env: {} })
    expect(configurator.timeout).to.equal(60)
  })

  it('layers the local file over the home file', () => {
    writeFileSync(homeConfig, JSON.stringify({ GRIST_DOC_ID: 'homedoc', GRIST_TEAM_SITE: 'hometeam' }))
    writeFileSync(join(tempDir, LOCAL_CONFIG_FILE), JSON.stringify({ GRIST_CLI_TIMEOUT: '15', GRIST_DOC_ID: 'localdoc' }))
    const configurator = new CliConfigurator(undefined, { configPath: homeConfig, env: {} })

    expect(configurator.docId).to.equal('localdoc')
    expect(configurator.config.GRIST_TEAM_SITE).to.equal('hometeam')
    expect(configurator.timeout).to.equal(15)
  })

  it('turns off raising and safe mode whatever the sources say', () => {
    writeFileSync(join(tempDir, LOCAL_CONFIG_FILE), JSON.stringify({ GRIST_RAISE_ERROR: 'Y' }))
    const configurator = new CliConfigurator(undefined, { configPath: homeConfig, env: { GRIST_SAFEMODE: 'Y' } })

    expect(configurator.raiseOnError).to.be.false
    expect(configurator.safeMode).to.be.false
  })

  it('reads the timeout from the environment', () => {
    const configurator = new CliConfigurator(undefined, { configPath: homeConfig, env: { GRIST_CLI_TIMEOUT: '5' } })
    expect(configurator.timeout).to.equal(5)
  })

  it('rejects a timeout that is not a positive number', () => {
    const words = new CliConfigurator(undefined, { configPath: homeConfig, env: { GRIST_CLI_TIMEOUT: 'soon' } })
    expect(() => words.timeout).to.throw(ConfigurationError, 'GRIST_CLI_TIMEOUT must be a positive number of seconds, got "soon"')

    const zero = new CliConfigurator(undefined, { configPath: homeConfig, env: { GRIST_CLI_TIMEOUT: '0' } })
    expect(() => zero.timeout).to.throw(ConfigurationError)
  })

  it('cannot be patched', () => {
    const configurator = new CliConfigurator(undefined, { configPath: homeConfig, env: {} })
    expect(() => configurator.patch({ GRIST_DOC_ID: 'other' })).to.throw(ConfigurationError)
    expect(configurator.docId).to.equal('<your_doc_id_here>')
  })
})
