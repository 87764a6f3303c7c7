/**
 * FMP MCP Server: tool catalog.
 * Registration order here is the order tools are listed to clients.
 */

import type { ToolDescriptor } from "../registry/types.js";
import { analystTools } from "./analyst.js";
import { calendarTools } from "./calendar.js";
import { companyTools } from "./company.js";
import { cryptoTools } from "./crypto.js";
import { fundamentalsTools } from "./fundamentals.js";
import { marketDataTools } from "./market_data.js";
import { newsTools } from "./news.js";
import { optionsTools } from "./options.js";
import { referenceTools } from "./reference.js";

export const allTools: readonly ToolDescriptor[] = [
  ...marketDataTools,
  ...companyTools,
  ...fundamentalsTools,
  ...newsTools,
  ...optionsTools,
  ...analystTools,
  ...calendarTools,
  ...cryptoTools,
  ...referenceTools,
];
