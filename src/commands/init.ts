import {Command, Flags} from '@oclif/core'
import {constants} from 'node:fs'
import {copyFile, mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {BUNDLED_INSTRUCTIONS_PATH} from '../config/instructions.js'
import {getGlobalInstructionsPath, getMailpilotHome} from '../config/paths.js'

const ENV_EXAMPLE = [
  'OPENAI_API_KEY=',
  'OPENAI_MODEL=gpt-4o-mini',
  'OPENAI_BASE_URL=',
  'TENANT_ID=',
  'CLIENT_ID=',
  'CLIENT_SECRET=',
  'MAILBOX_USER_ID=',
  ''
].join('\n')

export default class Init extends Command {
  static override description = 'Create a project config and the global mailpilot home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing files'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const flag = flags.force ? 'w' : 'wx'
    const homeDir = getMailpilotHome()
    const configPath = resolve(process.cwd(), '.mailpilotrc.json')
    const envExamplePath = resolve(homeDir, '.env.example')
    const instructionsPath = getGlobalInstructionsPath(homeDir)

    await mkdir(homeDir, {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify(
        {
          provider: 'openai',
          model: 'gpt-4o-mini',
          runtime: {maxIterations: 10},
          display: {mode: 'verbose'}
        },
        null,
        2
      ) + '\n',
      {flag}
    )
    await writeFile(envExamplePath, ENV_EXAMPLE, {flag})
    await copyFile(BUNDLED_INSTRUCTIONS_PATH, instructionsPath, flags.force ? 0 : constants.COPYFILE_EXCL)

    this.log(`Created ${configPath}`)
    this.log(`Created ${envExamplePath}`)
    this.log(`Created ${instructionsPath}`)
  }
}
