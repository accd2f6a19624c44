import app from '@adonisjs/core/services/app'
import logger from '@adonisjs/core/services/logger'
import { readFile } from 'node:fs/promises'
import type MenuBlueprintFactory from './menu_blueprint_factory.js'
import type MenuRegistry from './menu_registry.js'
import type { RichMenuPlatform } from '#bot/contracts/platform.contract'
import type { SupportedLanguage } from '#bot/types/bot_types'
import type {
  RegistrySnapshot,
  RichMenuArtifact,
  RichMenuSummary,
} from '#bot/types/rich_menu_types'
import { MissingArtifactException } from '#exceptions/bot_exceptions'
import { withTimeout } from '#bot/utils/timeout'

export interface MenuReconcilerOptions {
  languages: readonly SupportedLanguage[]
  imageDirectory: string
  platformTimeoutMs: number
}

interface ExistingMenus {
  current: Map<SupportedLanguage, RichMenuSummary>
  obsolete: string[]
}

/**
 * Passe de réconciliation exécutée une fois au démarrage : réutilise les
 * menus déjà créés pour la version de disposition courante, crée ceux qui
 * manquent, retire les autres versions puis fige le registre.
 */
export default class MenuReconciler {
  constructor(
    private readonly platform: RichMenuPlatform,
    private readonly factory: MenuBlueprintFactory,
    private readonly registry: MenuRegistry,
    private readonly options: MenuReconcilerOptions
  ) {}

  public async reconcile(): Promise<RegistrySnapshot> {
    const listed = await this.callPlatform(() => this.platform.listArtifacts())
    const { current, obsolete } = this.classify(listed)
    const artifacts: RichMenuArtifact[] = []

    for (const language of this.options.languages) {
      const summary = current.get(language)
      if (summary) {
        artifacts.push({
          artifactId: summary.artifactId,
          language,
          name: summary.name,
          layoutVersion: this.factory.layoutVersion,
        })
        continue
      }

      try {
        artifacts.push(await this.provision(language))
      } catch (error) {
        logger.error(
          { language, error: error instanceof Error ? error.message : String(error) },
          'Rich menu creation failed'
        )
      }
    }

    this.registry.populate(artifacts, obsolete)
    const missing = this.registry.missingLanguages(this.options.languages)
    if (missing.length > 0) {
      const error = new MissingArtifactException(missing)
      logger.fatal({ missing }, error.message)
      throw error
    }

    // Les anciennes versions restent en place tant qu'une langue manque
    await this.retire(obsolete)
    this.registry.freeze()
    logger.info(
      {
        reused: current.size,
        created: artifacts.length - current.size,
        retired: obsolete.length,
        layoutVersion: this.factory.layoutVersion,
      },
      'Rich menus reconciled'
    )

    return this.registry.snapshot()
  }

  /**
   * Opération d'administration : crée le menu d'une langue et l'ajoute au
   * registre figé
   */
  public async provisionLanguage(language: SupportedLanguage): Promise<RichMenuArtifact> {
    const artifact = await this.provision(language)
    await this.registry.extend(artifact)
    return artifact
  }

  private classify(listed: RichMenuSummary[]): ExistingMenus {
    const current = new Map<SupportedLanguage, RichMenuSummary>()
    const obsolete: string[] = []

    for (const summary of listed) {
      const parsed = this.factory.parseName(summary.name)
      if (!parsed) continue

      if (parsed.version !== this.factory.layoutVersion || current.has(parsed.language)) {
        obsolete.push(summary.artifactId)
      } else {
        current.set(parsed.language, summary)
      }
    }

    return { current, obsolete }
  }

  private async provision(language: SupportedLanguage): Promise<RichMenuArtifact> {
    const blueprint = this.factory.build(language)
    const artifactId = await this.callPlatform(() => this.platform.createArtifact(blueprint))

    const image = await this.loadImage(language)
    if (image) {
      await this.callPlatform(() => this.platform.uploadImage(artifactId, image, 'image/png'))
    } else {
      logger.warn({ language, artifactId }, 'No rich menu image found, menu created without image')
    }

    logger.info({ language, artifactId, name: blueprint.name }, 'Rich menu created')

    return {
      artifactId,
      language,
      name: blueprint.name,
      layoutVersion: blueprint.layoutVersion,
    }
  }

  private async loadImage(language: SupportedLanguage): Promise<Buffer | null> {
    try {
      return await readFile(app.makePath(this.options.imageDirectory, `menu_${language}.png`))
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null
      }
      throw error
    }
  }

  private async retire(artifactIds: string[]): Promise<void> {
    for (const artifactId of artifactIds) {
      try {
        await this.callPlatform(() => this.platform.deleteArtifact(artifactId))
        logger.info({ artifactId }, 'Obsolete rich menu deleted')
      } catch (error) {
        logger.warn(
          { artifactId, error: error instanceof Error ? error.message : String(error) },
          'Could not delete obsolete rich menu'
        )
      }
    }
  }

  private callPlatform<T>(operation: () => Promise<T>): Promise<T> {
    return withTimeout('ui_platform', this.options.platformTimeoutMs, operation)
  }
}
