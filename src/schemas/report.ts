import { z } from 'zod';

export const ThresholdsSchema = z
  .object({
    warning: z.number().finite({ message: 'warning threshold must be a finite number' }),
    critical: z.number().finite({ message: 'critical threshold must be a finite number' }),
  })
  .refine((t) => t.warning <= t.critical, {
    message: 'warning threshold must not exceed critical threshold',
  });

export const StatusLevelSchema = z.enum(['good', 'warning', 'critical']);

export const AnalysisResultSchema = z.object({
  trends: z.array(z.string().min(1)).max(3),
  trafficStatus: StatusLevelSchema,
  capacityStatus: StatusLevelSchema,
});

export const ReportContextSchema = z.object({
  user_name: z.string(),
  timestamp: z.string(),
  event_name: z.string(),
  report_date: z.string(),
  report_time: z.string(),
  dashboard_url: z.string(),
  traffic_status: z.string().min(1),
  capacity_status: z.string().min(1),
  trends: z.string(),
  tsys_avg_tps: z.string(),
  tsys_peak_tps: z.string(),
  tsys_peak_time: z.string(),
  tsys_avg_capacity: z.string(),
  hpns_avg_tps: z.string(),
  hpns_peak_tps: z.string(),
  hpns_peak_time: z.string(),
  hpns_avg_capacity: z.string(),
});

export type ReportContext = z.infer<typeof ReportContextSchema>;

const DashboardPageSchema = z.object({
  widgets: z.array(z.record(z.unknown())).nullish(),
});

/**
 * Envelope of the NerdGraph dashboard query. Widget bodies stay untyped and
 * go to the widget parser as plain records.
 */
export const NerdGraphDashboardResponseSchema = z.object({
  data: z
    .object({
      actor: z
        .object({
          entity: z
            .object({
              pages: z.array(DashboardPageSchema).nullish(),
            })
            .nullish(),
        })
        .nullish(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).nullish(),
});

