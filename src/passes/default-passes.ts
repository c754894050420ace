// SPDX-License-Identifier: MIT
// Reforge Default Pass Catalogue

import { flattenGroups, type PassDescriptor, type PassGroup } from "../pipeline/pass.ts";
import { hygienePasses } from "./hygiene.ts";
import { loopPasses } from "./loops.ts";
import { modulePasses } from "./module.ts";
import { simplifyPasses } from "./simplify.ts";

/** The built-in passes, grouped in run order. */
export function defaultPassGroups(): PassGroup[] {
	return [
		{ name: "loops", passes: loopPasses },
		{ name: "simplify", passes: simplifyPasses },
		{ name: "hygiene", passes: hygienePasses },
		{ name: "module", passes: modulePasses },
	];
}

export function defaultPasses(): PassDescriptor[] {
	return flattenGroups(defaultPassGroups());
}
