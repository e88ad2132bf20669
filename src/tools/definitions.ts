/**
 * Inventory tools exposed to the LLM.
 *
 * Each tool carries its OpenAI function definition (what the model sees), a zod schema
 * that validates the arguments the model sends back, and the call it makes on the
 * inventory adapter. Tools are type-erased once defined; `prepare` is the only way in.
 */

import { z } from "zod";
import type { InventoryAdapter } from "../inventory/InventoryAdapter";
import {
  formatCreatedItem,
  formatItemDetails,
  formatLabels,
  formatLocationItems,
  formatLocations,
  formatQuantityUpdate,
  formatSearchResults
} from "./format";

export type ToolContext = {
  inventory: InventoryAdapter;
  allowWrite: boolean;
  defaultPageSize: number;
};

type JsonSchemaProperty = {
  type: "string" | "integer" | "array";
  description: string;
  minimum?: number;
  maximum?: number;
  items?: { type: "string" };
};

export type ToolParameters = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
};

/** OpenAI chat-completions function tool. */
export type ToolDefinition = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ToolParameters;
  };
};

type ToolConfig<T> = {
  name: string;
  description: string;
  parameters: ToolParameters;
  /** Mutates the inventory; only offered when writes are enabled. */
  write: boolean;
  /** Prefix for inventory failures, e.g. "Error searching items". */
  errorPrefix: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  run(args: T, ctx: ToolContext): Promise<string>;
};

export type PreparedCall =
  | { success: true; run(ctx: ToolContext): Promise<string> }
  | { success: false; issues: string };

export type InventoryTool = Omit<ToolConfig<unknown>, "schema" | "run"> & {
  /** Validates raw model arguments and binds them to the tool. */
  prepare(args: unknown): PreparedCall;
};

export function formatIssues(error: z.ZodError) {
  return error.issues.map(i => `${i.path.length ? i.path.join(".") : "arguments"}: ${i.message}`).join("; ");
}

// Models often quote numbers; null, "" and booleans must not turn into 0.
const wholeNumber = z.union([
  z.number(),
  z.string().trim().regex(/^\d+$/, "Expected a whole number").transform(Number)
]);

const page = wholeNumber.pipe(z.number().int().min(1)).default(1);
const pageSize = wholeNumber.pipe(z.number().int().min(1).max(100)).optional();
const id = z.string().trim().min(1);

const pagingProperties: Record<string, JsonSchemaProperty> = {
  page: { type: "integer", description: "Page number (default: 1)", minimum: 1 },
  page_size: { type: "integer", description: "Number of items per page (default: server setting)", minimum: 1, maximum: 100 }
};

function defineTool<T>(config: ToolConfig<T>): InventoryTool {
  const { schema, run, ...meta } = config;
  return {
    ...meta,
    prepare(args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) return { success: false, issues: formatIssues(parsed.error) };
      const data = parsed.data;
      return { success: true, run: ctx => run(data, ctx) };
    }
  };
}

export const searchItems = defineTool({
  name: "search_items",
  description: "Search for items in the Homebox inventory by free text (name, description, manufacturer, model).",
  parameters: {
    type: "object",
    properties: {
      query: { type: "string", description: "Search query string" },
      ...pagingProperties
    },
    required: ["query"]
  },
  write: false,
  errorPrefix: "Error searching items",
  schema: z.object({ query: z.string(), page, page_size: pageSize }),
  async run(args, ctx) {
    const size = args.page_size ?? ctx.defaultPageSize;
    const data = await ctx.inventory.searchItems({ query: args.query, page: args.page, pageSize: size });
    return formatSearchResults(args.query, args.page, size, data);
  }
});

export const getItemDetails = defineTool({
  name: "get_item_details",
  description:
    "Get detailed information about a specific item: purchase, warranty, custom fields and notes. Use an ID from search results.",
  parameters: {
    type: "object",
    properties: { item_id: { type: "string", description: "The ID of the item to retrieve" } },
    required: ["item_id"]
  },
  write: false,
  errorPrefix: "Error retrieving item details",
  schema: z.object({ item_id: id }),
  async run(args, ctx) {
    return formatItemDetails(await ctx.inventory.getItem(args.item_id));
  }
});

export const listLocations = defineTool({
  name: "list_locations",
  description: "List all locations in the Homebox inventory with their IDs.",
  parameters: { type: "object", properties: {} },
  write: false,
  errorPrefix: "Error listing locations",
  schema: z.object({}),
  async run(_args, ctx) {
    return formatLocations(await ctx.inventory.listLocations());
  }
});

export const searchItemsByLocation = defineTool({
  name: "search_items_by_location",
  description: "List the items stored in a specific location. Use an ID from list_locations.",
  parameters: {
    type: "object",
    properties: {
      location_id: { type: "string", description: "The ID of the location to search in" },
      ...pagingProperties
    },
    required: ["location_id"]
  },
  write: false,
  errorPrefix: "Error searching items by location",
  schema: z.object({ location_id: id, page, page_size: pageSize }),
  async run(args, ctx) {
    const size = args.page_size ?? ctx.defaultPageSize;
    const data = await ctx.inventory.searchItems({ locationIds: [args.location_id], page: args.page, pageSize: size });
    return formatLocationItems(args.page, size, data);
  }
});

export const listLabels = defineTool({
  name: "list_labels",
  description: "List all labels (tags) in the Homebox inventory with their IDs.",
  parameters: { type: "object", properties: {} },
  write: false,
  errorPrefix: "Error listing labels",
  schema: z.object({}),
  async run(_args, ctx) {
    return formatLabels(await ctx.inventory.listLabels());
  }
});

export const createItem = defineTool({
  name: "create_item",
  description: "Create a new item in the Homebox inventory.",
  parameters: {
    type: "object",
    properties: {
      name: { type: "string", description: "Item name" },
      description: { type: "string", description: "Optional description" },
      location_id: { type: "string", description: "ID of the location to store the item in" },
      label_ids: { type: "array", items: { type: "string" }, description: "IDs of labels to attach" }
    },
    required: ["name"]
  },
  write: true,
  errorPrefix: "Error creating item",
  schema: z.object({
    name: z.string().trim().min(1),
    description: z.string().optional(),
    location_id: id.optional(),
    label_ids: z.array(id).optional()
  }),
  async run(args, ctx) {
    const created = await ctx.inventory.createItem({
      name: args.name,
      description: args.description,
      locationId: args.location_id,
      labelIds: args.label_ids
    });
    return formatCreatedItem(created);
  }
});

export const updateItemQuantity = defineTool({
  name: "update_item_quantity",
  description: "Set the quantity of an existing item.",
  parameters: {
    type: "object",
    properties: {
      item_id: { type: "string", description: "The ID of the item to update" },
      quantity: { type: "integer", description: "New quantity", minimum: 0 }
    },
    required: ["item_id", "quantity"]
  },
  write: true,
  errorPrefix: "Error updating item quantity",
  schema: z.object({ item_id: id, quantity: wholeNumber.pipe(z.number().int().min(0)) }),
  async run(args, ctx) {
    return formatQuantityUpdate(await ctx.inventory.updateItemQuantity(args.item_id, args.quantity));
  }
});

export const inventoryTools: InventoryTool[] = [
  searchItems,
  getItemDetails,
  listLocations,
  searchItemsByLocation,
  listLabels,
  createItem,
  updateItemQuantity
];

export function findTool(name: string) {
  return inventoryTools.find(t => t.name === name);
}

export function getToolDefinitions(options: { allowWrite: boolean }): ToolDefinition[] {
  return inventoryTools
    .filter(t => options.allowWrite || !t.write)
    .map(t => ({
      type: "function",
      function: { name: t.name, description: t.description, parameters: t.parameters }
    }));
}
