import { defineLookupTool } from "./lookup.js";

export const corporateCalendar = defineLookupTool({
  name: "corporate_calendar",
  description: "Corporate events: dividends, earnings, IPOs and splits, per company or as a date-range calendar.",
  category: "Calendar",
  selector: "calendar_type",
  kinds: [
    "dividends",
    "dividends_calendar",
    "earnings",
    "earnings_calendar",
    "ipos_calendar",
    "ipos_disclosure",
    "ipos_prospectus",
    "splits",
    "splits_calendar",
  ],
});

export const mergersAcquisitions = defineLookupTool({
  name: "mergers_acquisitions",
  description: "Mergers and acquisitions: latest filings, or a search by company name via params.",
  category: "Calendar",
  selector: "ma_type",
  kinds: ["latest", "search"],
  prefix: "mergers-acquisitions-",
});

export const cotReport = defineLookupTool({
  name: "cot_report",
  description: "Commitment of Traders data: the report, its analysis, or the list of covered markets.",
  category: "Calendar",
  selector: "report_type",
  kinds: ["report", "analysis", "list"],
  prefix: "commitment-of-traders-",
});

export const calendarTools = [corporateCalendar, mergersAcquisitions, cotReport];
