/**
 * collection-health core - Reports on the store and collection
 *
 * Never fails: the health report itself carries any problem.
 */

import { z } from "zod";
import type { HealthReport, RetrievalService } from "../../retrieval";

export const collectionHealthSchema = z.object({});

export const collectionHealthDescription = `Check whether the vector store is reachable, whether the passage collection exists, and how many passages it holds.`;

export async function collectionHealth(service: RetrievalService): Promise<string> {
  return formatHealthReport(await service.checkHealth(), service.collection);
}

/**
 * Renders a health report as a few "key: value" lines.
 */
export function formatHealthReport(report: HealthReport, collection: string): string {
  return [
    `Status: ${report.status}`,
    `Connectivity: ${report.connectivity}`,
    `Collection: ${collection} (${report.collectionExists ? "exists" : "missing"})`,
    `Records: ${report.recordCount ?? "unknown"}`,
    `Detail: ${report.detail}`,
  ].join("\n");
}
