import type { Json } from '@metamask/utils';

import type { ErrorCode } from './constants.ts';

export type LoopError = {
  code: ErrorCode;
  data: Json | undefined;
} & Error;
