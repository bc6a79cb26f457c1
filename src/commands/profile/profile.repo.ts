import { Injectable } from '@nestjs/common'
import path from 'path'
import { parse as parseYaml } from 'yaml'
import { readTextFile } from '../../shared/utils/fs.util'
import { ProfileInvalidException, ProfileNotFoundException, ProfileUnreadableException } from './profile.error'
import { ProfileSchema } from './profile.model'
import type { Profile } from './profile.model'

const YAML_EXTENSIONS = new Set(['.yaml', '.yml'])

@Injectable()
export class ProfileRepo {
  /**
   * Load and validate a profile document. `.yaml`/`.yml` files are read as
   * YAML, everything else as JSON.
   */
  async findProfile(source: string): Promise<Profile> {
    const content = await readTextFile(source, ProfileNotFoundException)

    let document: unknown
    try {
      document = YAML_EXTENSIONS.has(path.extname(source).toLowerCase()) ? parseYaml(content) : JSON.parse(content)
    } catch (error) {
      throw ProfileUnreadableException(source, error instanceof Error ? error.message : String(error))
    }

    const result = ProfileSchema.safeParse(document)
    if (!result.success) {
      throw ProfileInvalidException(source, result.error.issues)
    }

    return result.data
  }
}
