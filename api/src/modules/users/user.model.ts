import { UserRole } from '../../shared/auth/auth.types';

export type User = {
  id: string;
  tenantId: string;
  email: string;
  role: UserRole;
  createdAt: string;
};
