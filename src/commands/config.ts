import {Command} from '@oclif/core'
import {loadConfig, redactConfig} from '../config/load-config.js'

export default class Config extends Command {
  static override description = 'Print resolved config with secrets redacted'

  public async run(): Promise<void> {
    const config = await loadConfig()
    this.log(JSON.stringify(redactConfig(config), null, 2))
  }
}
