import { messagingApi } from '@line/bot-sdk'
import type { RichMenuPlatform } from '#bot/contracts/platform.contract'
import type { RichMenuBlueprint, RichMenuSummary } from '#bot/types/rich_menu_types'

export interface LineRichMenuPlatformConfig {
  channelAccessToken: string
}

/**
 * Menus riches LINE. Lier un menu à un utilisateur remplace le lien
 * précédent : la réassignation est atomique.
 */
export default class LineRichMenuPlatform implements RichMenuPlatform {
  public readonly supportsAtomicReassign = true
  private readonly client: messagingApi.MessagingApiClient
  private readonly blobClient: messagingApi.MessagingApiBlobClient

  constructor(config: LineRichMenuPlatformConfig) {
    this.client = new messagingApi.MessagingApiClient({
      channelAccessToken: config.channelAccessToken,
    })
    this.blobClient = new messagingApi.MessagingApiBlobClient({
      channelAccessToken: config.channelAccessToken,
    })
  }

  public async createArtifact(blueprint: RichMenuBlueprint): Promise<string> {
    const { richMenuId } = await this.client.createRichMenu(this.toRequest(blueprint))
    return richMenuId
  }

  public async uploadImage(artifactId: string, image: Buffer, contentType: string): Promise<void> {
    await this.blobClient.setRichMenuImage(
      artifactId,
      new Blob([new Uint8Array(image)], { type: contentType })
    )
  }

  public async linkArtifact(userId: string, artifactId: string): Promise<void> {
    await this.client.linkRichMenuIdToUser(userId, artifactId)
  }

  public async unlinkArtifact(userId: string): Promise<void> {
    await this.client.unlinkRichMenuIdFromUser(userId)
  }

  public async listArtifacts(): Promise<RichMenuSummary[]> {
    const { richmenus } = await this.client.getRichMenuList()
    return richmenus.map((menu) => ({ artifactId: menu.richMenuId, name: menu.name }))
  }

  public async deleteArtifact(artifactId: string): Promise<void> {
    await this.client.deleteRichMenu(artifactId)
  }

  private toRequest(blueprint: RichMenuBlueprint): messagingApi.RichMenuRequest {
    return {
      size: blueprint.size,
      selected: blueprint.selected,
      name: blueprint.name,
      chatBarText: blueprint.chatBarText,
      areas: blueprint.buttons.map((button) => {
        const action: messagingApi.PostbackAction = {
          type: 'postback',
          label: button.label,
          data: button.postback,
          displayText: button.label,
        }
        return { bounds: button.bounds, action }
      }),
    }
  }
}
