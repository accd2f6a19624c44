import app from '@adonisjs/core/services/app'
import { readFile } from 'node:fs/promises'
import { parse } from 'yaml'
import I18nManager from '#bot/core/managers/i18n_manager'
import { richMenuLayoutValidator } from '#validators/rich_menu_layout_validator'
import { isSupportedLanguage, type SupportedLanguage } from '#bot/types/bot_types'
import type { RichMenuBlueprint, RichMenuLayout } from '#bot/types/rich_menu_types'

const CHAT_BAR_MAX_LENGTH = 14

/**
 * Construit la description d'un menu riche pour une langue à partir de
 * la disposition commune et des libellés localisés.
 *
 * Nom des menus : `<prefix>-<langue>-v<version>`.
 */
export default class MenuBlueprintFactory {
  private readonly namePattern: RegExp

  constructor(
    private readonly layout: RichMenuLayout,
    private readonly prefix: string,
    private readonly i18n: I18nManager = I18nManager.getInstance()
  ) {
    this.namePattern = new RegExp(`^${prefix.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}-([a-z]{2,3})-v(\\d+)$`)
  }

  /**
   * Charge et valide la disposition YAML
   */
  static async fromFile(relativePath: string, prefix: string): Promise<MenuBlueprintFactory> {
    const content = await readFile(app.makePath(relativePath), 'utf-8')
    const layout = await richMenuLayoutValidator.validate(parse(content))
    return new MenuBlueprintFactory(layout, prefix)
  }

  public get layoutVersion(): number {
    return this.layout.version
  }

  public artifactName(language: SupportedLanguage): string {
    return `${this.prefix}-${language}-v${this.layout.version}`
  }

  /**
   * Décode un nom de menu ; `null` s'il n'appartient pas à ce préfixe
   */
  public parseName(name: string): { language: SupportedLanguage; version: number } | null {
    const match = this.namePattern.exec(name)
    if (!match || !isSupportedLanguage(match[1])) {
      return null
    }
    return { language: match[1], version: Number(match[2]) }
  }

  public build(language: SupportedLanguage): RichMenuBlueprint {
    return {
      name: this.artifactName(language),
      language,
      layoutVersion: this.layout.version,
      chatBarText: this.i18n.t('rich_menu.chat_bar', {}, language).slice(0, CHAT_BAR_MAX_LENGTH),
      size: { ...this.layout.size },
      selected: this.layout.selected,
      buttons: this.layout.buttons.map((button) => ({
        ...button,
        bounds: { ...button.bounds },
        label: this.i18n.t(`rich_menu.buttons.${button.id}`, {}, language),
      })),
    }
  }
}
