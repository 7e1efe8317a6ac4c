import path from "path";

import fs from "fs-extra";
import minimist from "minimist";
import _ from "lodash";

const cmdArgs = minimist(process.argv.slice(2), {
  string: ["env", "name", "host", "port"],
});

const envVars = process.env;

interface PackageInfo {
  name: string;
  version: string;
  description?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return _.isPlainObject(value);
}

function readPackageInfo(): PackageInfo {
  const packagePath = path.join(path.resolve(), "package.json");
  try {
    const raw: unknown = fs.readJsonSync(packagePath);
    const record: Record<string, unknown> = isRecord(raw) ? raw : {};
    return {
      name: _.isString(record.name) ? record.name : "flow-gateway",
      version: _.isString(record.version) ? record.version : "0.0.0",
      description: _.isString(record.description) ? record.description : undefined,
    };
  } catch {
    return { name: "flow-gateway", version: "0.0.0" };
  }
}

function parsePort(value: unknown): number | undefined {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined;
}

class Environment {
  readonly cmdArgs = cmdArgs;
  readonly envVars = envVars;
  /** Selects configs/<env>/service.yml */
  readonly env: string;
  readonly name?: string;
  readonly host?: string;
  readonly port?: number;
  readonly package: PackageInfo;

  constructor() {
    this.env = (_.isString(cmdArgs.env) && cmdArgs.env) || envVars.SERVER_ENV || "dev";
    this.name = (_.isString(cmdArgs.name) && cmdArgs.name) || envVars.SERVER_NAME || undefined;
    this.host = (_.isString(cmdArgs.host) && cmdArgs.host) || envVars.SERVER_HOST || undefined;
    this.port = parsePort(cmdArgs.port) ?? parsePort(envVars.SERVER_PORT);
    this.package = readPackageInfo();
  }
}

export default new Environment();
