import logger from '@adonisjs/core/services/logger'
import pLimit from 'p-limit'
import type { SupportedLanguage } from '#bot/types/bot_types'
import type { RegistrySnapshot, RichMenuArtifact } from '#bot/types/rich_menu_types'

/**
 * Registre langue → menu riche, partagé par tout le processus.
 *
 * Rempli une fois par la réconciliation de démarrage puis figé. La seule
 * écriture possible ensuite est `extend()`, sérialisée par une file
 * d'administration ; les lecteurs voient toujours une map complète
 * (remplacement par copie).
 */
export default class MenuRegistry {
  private entries: ReadonlyMap<SupportedLanguage, RichMenuArtifact> = new Map()
  private byArtifactId: ReadonlyMap<string, RichMenuArtifact> = new Map()
  private retired: ReadonlySet<string> = new Set()
  private frozen = false
  private readonly adminLane = pLimit(1)

  /**
   * Remplit le registre avant le démarrage du trafic
   */
  public populate(artifacts: RichMenuArtifact[], retiredIds: string[] = []): void {
    if (this.frozen) {
      throw new Error('Menu registry is frozen; use extend() to add a language')
    }

    this.replace(
      new Map(
        artifacts.map((artifact): [SupportedLanguage, RichMenuArtifact] => [
          artifact.language,
          artifact,
        ])
      )
    )
    this.retired = new Set(retiredIds)
  }

  public freeze(): void {
    this.frozen = true
    logger.info({ languages: [...this.entries.keys()] }, 'Rich menu registry frozen')
  }

  public get isFrozen(): boolean {
    return this.frozen
  }

  public get(language: SupportedLanguage): RichMenuArtifact | undefined {
    return this.entries.get(language)
  }

  /**
   * Langue d'un menu connu, `undefined` pour un identifiant inconnu
   */
  public languageOf(artifactId: string): SupportedLanguage | undefined {
    return this.byArtifactId.get(artifactId)?.language
  }

  public isRetired(artifactId: string): boolean {
    return this.retired.has(artifactId)
  }

  public missingLanguages(languages: readonly SupportedLanguage[]): SupportedLanguage[] {
    return languages.filter((language) => !this.entries.has(language))
  }

  /**
   * Ajoute ou remplace le menu d'une langue après le gel
   */
  public async extend(artifact: RichMenuArtifact): Promise<void> {
    await this.adminLane(async () => {
      const previous = this.entries.get(artifact.language)
      const next = new Map(this.entries)
      next.set(artifact.language, artifact)
      this.replace(next)

      if (previous && previous.artifactId !== artifact.artifactId) {
        this.retired = new Set([...this.retired, previous.artifactId])
      }

      logger.info(
        { language: artifact.language, artifactId: artifact.artifactId },
        'Rich menu registry extended'
      )
    })
  }

  public snapshot(): RegistrySnapshot {
    return {
      frozen: this.frozen,
      entries: [...this.entries.values()].map((artifact) => ({ ...artifact })),
      retired: [...this.retired],
    }
  }

  private replace(next: Map<SupportedLanguage, RichMenuArtifact>): void {
    this.entries = next
    this.byArtifactId = new Map(
      [...next.values()].map((artifact): [string, RichMenuArtifact] => [
        artifact.artifactId,
        artifact,
      ])
    )
  }
}
