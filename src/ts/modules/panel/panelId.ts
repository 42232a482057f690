/** Process-unique panel identifier (UUID v4) */
export type PanelId = string;

export function newPanelId(): PanelId {
  return crypto.randomUUID();
}
