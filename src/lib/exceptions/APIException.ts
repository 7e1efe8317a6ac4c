import Exception, { type ExceptionDefinition } from "./Exception.ts";

export default class APIException extends Exception {
  constructor(exception: ExceptionDefinition, errmsg?: string) {
    super(exception, errmsg);
  }
}
