import type { CustomField, ItemDetails, ItemPage, ItemSummary, Label, Location } from "../types";

// Homebox reports unset dates as 0001-01-01T00:00:00Z.
function isSetDate(value?: string | null): value is string {
  return !!value && !value.startsWith("0001-01-01");
}

function hasQuantity(item: ItemSummary) {
  return item.quantity !== undefined && item.quantity !== null;
}

export function fieldValueOf(field: CustomField) {
  if (field.value !== undefined && field.value !== null) return String(field.value);
  if (field.type === "number") return String(field.numberValue ?? "");
  if (field.type === "boolean") return String(field.booleanValue ?? "");
  return String(field.textValue ?? "");
}

function pageFooter(page: number, pageSize: number, total: number) {
  const totalPages = Math.ceil(total / pageSize);
  let result = `Page ${page} of ${totalPages}\n`;
  if (page < totalPages) {
    result += `Use 'page=${page + 1}' to see more results.`;
  }
  return result;
}

export function formatSearchResults(query: string, page: number, pageSize: number, data: ItemPage) {
  if (data.items.length === 0) return `No items found matching '${query}'.`;

  let result = `Found ${data.total} items matching '${query}':\n\n`;
  data.items.forEach((item, idx) => {
    result += `${idx + 1}. ${item.name}\n`;
    if (item.description) result += `   Description: ${item.description}\n`;
    if (item.location) result += `   Location: ${item.location.name}\n`;
    if (item.assetId) result += `   Asset ID: ${item.assetId}\n`;
    if (hasQuantity(item)) result += `   Quantity: ${item.quantity}\n`;
    if (item.manufacturer) result += `   Manufacturer: ${item.manufacturer}\n`;
    if (item.modelNumber) result += `   Model: ${item.modelNumber}\n`;
    result += "\n";
  });
  return result + pageFooter(page, pageSize, data.total);
}

export function formatLocationItems(page: number, pageSize: number, data: ItemPage) {
  if (data.items.length === 0) return "No items found in the specified location.";

  const locationName = data.items[0].location?.name || "Unknown Location";
  let result = `Found ${data.total} items in location '${locationName}':\n\n`;
  data.items.forEach((item, idx) => {
    result += `${idx + 1}. ${item.name}\n`;
    if (item.description) result += `   Description: ${item.description}\n`;
    if (item.assetId) result += `   Asset ID: ${item.assetId}\n`;
    if (hasQuantity(item)) result += `   Quantity: ${item.quantity}\n`;
    result += "\n";
  });
  return result + pageFooter(page, pageSize, data.total);
}

export function formatItemDetails(item: ItemDetails) {
  let result = `Item Details: ${item.name}\n\n`;
  if (item.description) result += `Description: ${item.description}\n\n`;

  result += "Basic Information:\n";
  if (item.assetId) result += `- Asset ID: ${item.assetId}\n`;
  if (hasQuantity(item)) result += `- Quantity: ${item.quantity}\n`;
  if (item.manufacturer) result += `- Manufacturer: ${item.manufacturer}\n`;
  if (item.modelNumber) result += `- Model Number: ${item.modelNumber}\n`;
  if (item.serialNumber) result += `- Serial Number: ${item.serialNumber}\n`;

  if (item.location) result += `\nLocation: ${item.location.name}\n`;

  const purchase: string[] = [];
  if (item.purchaseFrom) purchase.push(`- Purchased From: ${item.purchaseFrom}`);
  if (item.purchasePrice) purchase.push(`- Purchase Price: ${item.purchasePrice}`);
  if (isSetDate(item.purchaseTime)) purchase.push(`- Purchase Date: ${item.purchaseTime}`);
  if (purchase.length) result += "\nPurchase Information:\n" + purchase.join("\n") + "\n";

  const warranty: string[] = [];
  if (item.lifetimeWarranty) warranty.push("- Lifetime Warranty: Yes");
  if (item.warrantyDetails) warranty.push(`- Warranty Details: ${item.warrantyDetails}`);
  if (isSetDate(item.warrantyExpires)) warranty.push(`- Warranty Expires: ${item.warrantyExpires}`);
  if (warranty.length) result += "\nWarranty Information:\n" + warranty.join("\n") + "\n";

  if (item.fields && item.fields.length) {
    result += "\nCustom Fields:\n";
    for (const field of item.fields) {
      result += `- ${field.name}: ${fieldValueOf(field)}\n`;
    }
  }

  if (item.notes) result += `\nNotes:\n${item.notes}\n`;
  return result;
}

function formatNamedList(kind: string, entries: { id: string; name: string; description?: string | null }[]) {
  if (entries.length === 0) return `No ${kind} found.`;
  let result = `Found ${entries.length} ${kind}:\n\n`;
  entries.forEach((entry, idx) => {
    result += `${idx + 1}. ${entry.name}\n`;
    if (entry.description) result += `   Description: ${entry.description}\n`;
    result += `   ID: ${entry.id}\n\n`;
  });
  return result;
}

export function formatLocations(locations: Location[]) {
  return formatNamedList("locations", locations);
}

export function formatLabels(labels: Label[]) {
  return formatNamedList("labels", labels);
}

export function formatCreatedItem(item: ItemSummary) {
  return `Created item '${item.name}' (ID: ${item.id}).`;
}

export function formatQuantityUpdate(item: ItemSummary) {
  return `Updated '${item.name}' quantity to ${item.quantity ?? 0}.`;
}
