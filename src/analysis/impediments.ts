import type {
  Impediment,
  ImpedimentCategory,
  ImpedimentReport,
  Ticket,
} from "../types.js";

export interface CategoryRule {
  category: Exclude<ImpedimentCategory, "technical">;
  keywords: readonly string[];
}

/** Evaluated in order; a summary matching none of them is a technical impediment. */
export const IMPEDIMENT_RULES: readonly CategoryRule[] = [
  { category: "external", keywords: ["waiting", "dependency", "external"] },
  { category: "process", keywords: ["approval", "process", "review"] },
  { category: "resource", keywords: ["resource", "capacity", "availability"] },
];

export const CATEGORY_ORDER: readonly ImpedimentCategory[] = [
  "technical",
  "external",
  "process",
  "resource",
];

const STRATEGIES: Record<ImpedimentCategory, string> = {
  technical: "Technical impediments: Assign senior developers or create technical spikes",
  external: "External dependencies: Follow up with external teams and escalate if needed",
  process: "Process blockers: Review approval workflows and expedite where possible",
  resource: "Resource constraints: Reassign work or bring in additional capacity",
};

export function categorizeImpediment(summary: string): ImpedimentCategory {
  const lower = summary.toLowerCase();
  const rule = IMPEDIMENT_RULES.find((r) => r.keywords.some((k) => lower.includes(k)));
  return rule?.category ?? "technical";
}

/** One advisory per category with at least one impediment, in {@link CATEGORY_ORDER}. */
export function resolutionStrategies(
  categories: Readonly<Record<ImpedimentCategory, number>>,
): string[] {
  return CATEGORY_ORDER.filter((c) => categories[c] > 0).map((c) => STRATEGIES[c]);
}

export function triageImpediments(tickets: readonly Ticket[]): ImpedimentReport {
  const categories: Record<ImpedimentCategory, number> = {
    technical: 0,
    external: 0,
    process: 0,
    resource: 0,
  };

  const impediments: Impediment[] = tickets.map((ticket) => {
    const category = categorizeImpediment(ticket.summary);
    categories[category] += 1;
    return {
      key: ticket.key,
      summary: ticket.summary,
      category,
      assignee: ticket.assignee,
      priority: ticket.priority,
    };
  });

  return {
    total: impediments.length,
    impediments,
    categories,
    resolutionStrategies: resolutionStrategies(categories),
  };
}
