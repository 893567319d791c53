import { z } from "zod";

export const ServiceParamsSchema = z.object({
  service: z.string().regex(/^[A-Za-z0-9_-]+$/),
});

export type ServiceParams = z.infer<typeof ServiceParamsSchema>;

export const ListServicesResponseSchema = z.object({
  services: z.array(z.string()),
});

export type ListServicesResponse = z.infer<typeof ListServicesResponseSchema>;
