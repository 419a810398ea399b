import { z } from "zod";

export const taskModelSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(""),
  isCompleted: z.boolean().default(false),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  category: z.string().optional(),
});

export const taskListSchema = z.array(taskModelSchema);

export type TaskModel = z.infer<typeof taskModelSchema>;

export type CreateTaskInput = {
  title: string;
  description: string;
};
