import { init } from '@paralleldrive/cuid2';

export const ACCESS_CODE_LENGTH = 8;

/** Short random code handed to users created by batch provisioning. */
export const generateAccessCode: () => string = init({ length: ACCESS_CODE_LENGTH });
