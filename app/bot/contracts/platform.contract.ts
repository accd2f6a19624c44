// app/bot/contracts/platform.contract.ts

import type { SupportedLanguage } from '#bot/types/bot_types'
import type { RichMenuBlueprint, RichMenuSummary } from '#bot/types/rich_menu_types'

/**
 * Plateforme qui héberge les menus riches
 */
export interface RichMenuPlatform {
  /**
   * Lier un nouveau menu remplace le précédent sans `unlink` préalable
   */
  readonly supportsAtomicReassign: boolean

  createArtifact(blueprint: RichMenuBlueprint): Promise<string>

  uploadImage(artifactId: string, image: Buffer, contentType: string): Promise<void>

  linkArtifact(userId: string, artifactId: string): Promise<void>

  unlinkArtifact(userId: string): Promise<void>

  listArtifacts(): Promise<RichMenuSummary[]>

  deleteArtifact(artifactId: string): Promise<void>
}

export type DetectionResult = SupportedLanguage | 'unknown'

/**
 * Détection de langue sur un texte libre
 */
export interface LanguageDetector {
  readonly name: string
  detect(text: string): Promise<DetectionResult>
}
