import { z } from 'zod';
import { POSITIONS } from '../core/types';

const teamName = z.string().trim().min(1, 'Team name cannot be empty').max(200);
const debateId = z.coerce.number().int().positive();
const position = z.enum(POSITIONS);

export const lookupSchema = z.object({
  teamName,
});

export const signupSchema = z.object({
  teamName,
  debateId,
  position,
});

export const overrideSchema = z.object({
  debateId,
  stakeholder: z.string().trim().min(1, 'Stakeholder cannot be empty'),
  teamName,
  position,
});

export const resetSchema = z.object({
  token: z.string().uuid().optional(),
});
