import { z } from 'zod';

import type { DocumentCodec, Stored } from '../codec';

/**
* User Domain Entity
*
* @module domains/documents/domain/entities/User
*/

/**
* Active flag kept as the strings "true"/"false" to match the stored
* and wire format of existing indexes.
*/
export type ActiveFlag = 'true' | 'false';

export interface UserFields {
  username: string;
  email: string;
  fullName: string;
  bio: string;
  isActive: ActiveFlag;
}

export interface NewUserInput {
  username: string;
  email: string;
  fullName: string;
  bio?: string | undefined;
  isActive?: ActiveFlag | undefined;
}

export function newUser(input: NewUserInput): UserFields {
  return {
    username: input.username,
    email: input.email,
    fullName: input.fullName,
    bio: input.bio ?? '',
    isActive: input.isActive ?? 'true',
  };
}

const userSourceSchema = z.object({
  username: z.string(),
  email: z.string(),
  full_name: z.string(),
  bio: z.string().default(''),
  is_active: z.enum(['true', 'false']).default('true'),
});

export const userCodec: DocumentCodec<UserFields> = {
  encode: (fields) => ({
    username: fields.username,
    email: fields.email,
    full_name: fields.fullName,
    bio: fields.bio,
    is_active: fields.isActive,
  }),
  decode: (source) => {
    const parsed = userSourceSchema.parse(source);
    return {
      username: parsed.username,
      email: parsed.email,
      fullName: parsed.full_name,
      bio: parsed.bio,
      isActive: parsed.is_active,
    };
  },
};

export type User = Stored<UserFields>;
