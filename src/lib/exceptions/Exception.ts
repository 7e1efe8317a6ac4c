import _ from "lodash";

export type ExceptionDefinition = readonly [number, string];

export default class Exception extends Error {
  /** Error code */
  errcode: number;
  /** Error message */
  errmsg: string;
  /** Extra payload carried to the response envelope */
  data: unknown;
  /** HTTP status the server answers with */
  httpStatusCode?: number;

  constructor(exception: ExceptionDefinition, errmsg?: string) {
    super(errmsg || exception[1]);
    this.name = new.target.name;
    this.errcode = exception[0];
    this.errmsg = errmsg || exception[1];
    this.data = null;
  }

  compare(exception: ExceptionDefinition) {
    return this.errcode === exception[0];
  }

  setHTTPStatusCode(value: number) {
    this.httpStatusCode = value;
    return this;
  }

  setData(value: unknown) {
    this.data = _.isUndefined(value) ? null : value;
    return this;
  }
}
