import type { SupportedLanguage } from './bot_types.js'
import type { SyncError } from '#exceptions/bot_exceptions'

export interface RichMenuBounds {
  x: number
  y: number
  width: number
  height: number
}

/**
 * Bouton de la disposition : zone + donnée de postback
 */
export interface RichMenuLayoutButton {
  id: string
  bounds: RichMenuBounds
  postback: string
}

/**
 * Disposition partagée par toutes les langues (resources/rich_menus/layout.yml).
 * Toute modification de géométrie impose d'incrémenter `version`.
 */
export interface RichMenuLayout {
  version: number
  size: { width: number; height: number }
  selected: boolean
  buttons: RichMenuLayoutButton[]
}

export interface RichMenuButton extends RichMenuLayoutButton {
  label: string
}

/**
 * Description complète d'un menu à créer pour une langue
 */
export interface RichMenuBlueprint {
  name: string
  language: SupportedLanguage
  layoutVersion: number
  chatBarText: string
  size: { width: number; height: number }
  selected: boolean
  buttons: RichMenuButton[]
}

/**
 * Menu tel que listé par la plateforme
 */
export interface RichMenuSummary {
  artifactId: string
  name: string
}

/**
 * Menu enregistré pour une langue
 */
export interface RichMenuArtifact {
  artifactId: string
  language: SupportedLanguage
  name: string
  layoutVersion: number
}

export interface RegistrySnapshot {
  frozen: boolean
  entries: RichMenuArtifact[]
  retired: string[]
}

export type SyncResult =
  | { ok: true; artifactId: string; changed: boolean }
  | { ok: false; error: SyncError }

export interface SyncAllSummary {
  total: number
  changed: number
  unchanged: number
  failed: number
}
