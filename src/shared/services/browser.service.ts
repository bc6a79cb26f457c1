import { Injectable } from '@nestjs/common'
import open from 'open'

/**
 * Opens URLs in the user's default browser.
 */
@Injectable()
export class BrowserService {
  async openUrl(url: string): Promise<void> {
    const child = await open(url, { wait: false })
    child.unref()
  }
}
