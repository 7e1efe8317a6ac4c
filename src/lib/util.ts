import crypto from "crypto";

import _ from "lodash";
import { v4 as uuidv4 } from "uuid";

const util = {
  uuid: (separator = true) => (separator ? uuidv4() : uuidv4().replace(/-/g, "")),

  md5: (value: string | Buffer) => crypto.createHash("md5").update(value).digest("hex"),

  sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)),

  unixTimestamp: () => Math.floor(Date.now() / 1000),

  timestamp: () => Date.now(),

  /** Inclusive on both ends. */
  randomInt: (min: number, max: number) => _.random(min, max),

  isHttpUrl: (value: unknown): value is string => _.isString(value) && /^https?:\/\//i.test(value),

  isBase64DataUrl: (value: unknown): value is string =>
    _.isString(value) && /^data:[a-z0-9.+-]+\/[a-z0-9.+-]+;base64,/i.test(value),

  extractBase64Data: (value: string) => value.replace(/^data:[^;]+;base64,/i, ""),

  maskSecret: (value: string) => (value.length <= 10 ? "***" : `${value.slice(0, 4)}...${value.slice(-4)}`),

  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
};

export default util;
