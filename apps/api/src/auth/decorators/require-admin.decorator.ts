import { SetMetadata } from '@nestjs/common';

export const REQUIRE_INSTANCE_ADMIN_KEY = 'requireInstanceAdmin';

/**
 * Restrict an endpoint to instance admins (see InstanceAdminGuard)
 */
export const RequireInstanceAdmin = () => SetMetadata(REQUIRE_INSTANCE_ADMIN_KEY, true);
