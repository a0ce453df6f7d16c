// Cluster management API shapes (only fields we use)

import { z } from "zod";

export const ClusterSchema = z.object({
  id: z.string(),
  external_id: z.string().nullish(),
  name: z.string().nullish(),
  display_name: z.string().nullish(),
  state: z.string().nullish(),
  hypershift: z.object({ enabled: z.boolean().nullish() }).nullish(),
});

export type Cluster = z.infer<typeof ClusterSchema>;

export const ClusterListSchema = z.object({
  page: z.number().int().nullish(),
  size: z.number().int().nullish(),
  total: z.number().int().nullish(),
  items: z.array(ClusterSchema).nullish(),
});

export type ClusterList = z.infer<typeof ClusterListSchema>;

export const LiveResourcesSchema = z.object({
  resources: z.record(z.string()).nullish(),
});

export type Server = {
  baseUrl: string;
  token: string;
};
