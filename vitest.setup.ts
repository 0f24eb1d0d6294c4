import { Logger } from "arbor-kernel";

// Specs that assert on log output configure their own destination
Logger.configure({ level: "silent", prettyPrint: false });
