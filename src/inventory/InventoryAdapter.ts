import type { ItemDetails, ItemPage, ItemQuery, ItemSummary, Label, Location, NewItem } from "../types";

export interface InventoryAdapter {
  searchItems(query: ItemQuery): Promise<ItemPage>;
  getItem(id: string): Promise<ItemDetails>;
  listLocations(): Promise<Location[]>;
  listLabels(): Promise<Label[]>;
  createItem(item: NewItem): Promise<ItemSummary>;
  updateItemQuantity(id: string, quantity: number): Promise<ItemSummary>;
}
