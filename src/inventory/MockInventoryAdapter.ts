import { InventoryAdapter } from "./InventoryAdapter";
import { HomeboxRequestError } from "../errors";
import type { ItemDetails, ItemQuery, ItemSummary, Label, Location, NewItem } from "../types";

export type MockInventorySeed = {
  locations: Location[];
  labels: Label[];
  items: ItemDetails[];
};

export const demoSeed: MockInventorySeed = {
  locations: [
    { id: "loc-garage", name: "Garage", description: "Shelving by the side door" },
    { id: "loc-office", name: "Office", description: "" }
  ],
  labels: [
    { id: "lbl-tools", name: "Tools" },
    { id: "lbl-electronics", name: "Electronics", description: "Anything with a plug" }
  ],
  items: [
    {
      id: "item-drill",
      name: "Cordless Drill",
      description: "18V drill with two batteries",
      quantity: 1,
      assetId: "000-001",
      manufacturer: "Makita",
      modelNumber: "DHP482",
      serialNumber: "SN-1234",
      location: { id: "loc-garage", name: "Garage" },
      labels: [{ id: "lbl-tools", name: "Tools" }],
      purchaseFrom: "Hardware Store",
      purchasePrice: 129.99,
      lifetimeWarranty: false,
      warrantyExpires: "2027-03-01"
    },
    {
      id: "item-screws",
      name: "Wood Screws 4mm",
      quantity: 200,
      location: { id: "loc-garage", name: "Garage" },
      labels: [{ id: "lbl-tools", name: "Tools" }]
    },
    {
      id: "item-monitor",
      name: "27in Monitor",
      quantity: 2,
      manufacturer: "Dell",
      location: { id: "loc-office", name: "Office" },
      labels: [{ id: "lbl-electronics", name: "Electronics" }],
      notes: "Left one has a dead pixel"
    }
  ]
};

function normalize(s?: string | null) {
  return (s || "").toLowerCase().trim();
}

function matches(item: ItemDetails, q: string) {
  if (!q) return true;
  return [item.name, item.description, item.manufacturer, item.modelNumber].some(f => normalize(f).includes(q));
}

function summarize(item: ItemDetails): ItemSummary {
  const { id, name, description, quantity, assetId, manufacturer, modelNumber, location, labels } = item;
  return { id, name, description, quantity, assetId, manufacturer, modelNumber, location, labels };
}

export class MockInventoryAdapter implements InventoryAdapter {
  private readonly locations: Location[];
  private readonly labels: Label[];
  private readonly items: ItemDetails[];
  private nextId = 1;

  constructor(seed: MockInventorySeed = demoSeed) {
    this.locations = seed.locations.map(l => ({ ...l }));
    this.labels = seed.labels.map(l => ({ ...l }));
    this.items = seed.items.map(i => ({ ...i }));
  }

  async searchItems(query: ItemQuery) {
    const q = normalize(query.query);
    const found = this.items.filter(
      it =>
        matches(it, q) &&
        (!query.locationIds?.length || (it.location && query.locationIds.includes(it.location.id))) &&
        (!query.labelIds?.length || (it.labels || []).some(l => query.labelIds?.includes(l.id)))
    );
    const start = (query.page - 1) * query.pageSize;
    return {
      page: query.page,
      pageSize: query.pageSize,
      total: found.length,
      items: found.slice(start, start + query.pageSize).map(summarize)
    };
  }

  async getItem(id: string) {
    const it = this.items.find(x => x.id === id);
    if (!it) throw new HomeboxRequestError(404, `item not found: ${id}`);
    return { ...it };
  }

  async listLocations() {
    return this.locations.map(l => ({ ...l }));
  }

  async listLabels() {
    return this.labels.map(l => ({ ...l }));
  }

  async createItem(item: NewItem) {
    const location = item.locationId ? this.locations.find(l => l.id === item.locationId) : undefined;
    if (item.locationId && !location) throw new HomeboxRequestError(400, `location not found: ${item.locationId}`);
    const labels = this.labels.filter(l => (item.labelIds || []).includes(l.id));
    const created: ItemDetails = {
      id: `item-new-${this.nextId++}`,
      name: item.name,
      description: item.description ?? "",
      quantity: 1,
      location: location ? { id: location.id, name: location.name } : null,
      labels
    };
    this.items.push(created);
    return summarize(created);
  }

  async updateItemQuantity(id: string, quantity: number) {
    const it = this.items.find(x => x.id === id);
    if (!it) throw new HomeboxRequestError(404, `item not found: ${id}`);
    it.quantity = quantity;
    return summarize(it);
  }
}
