export const ACTIVITY_TABLES = {
  graphActivity: "graph_activity.microsoft_graph_activity_logs",
} as const;
