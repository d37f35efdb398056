#!/usr/bin/env node

// Set CLI mode before any command loads the core logger
process.env["CLI_MODE"] = "true";

import Pastel from "pastel";

const app = new Pastel({
	importMeta: import.meta,
	version: "0.1.0",
	description: "Build, edit and walk arena-backed trees",
});

await app.run();
