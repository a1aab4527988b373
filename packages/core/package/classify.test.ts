import { describe, expect, it, vi } from "vitest"
import { brew, cask, mas, tap } from "../tests/refs"
import type { PackageMetadata } from "./classify"
import { classify, parseMasLiteral } from "./classify"

function metadata(known: { casks?: string[]; formulas?: string[] }): PackageMetadata {
	return {
		isKnownCask: vi.fn(async (name: string) => (known.casks ?? []).includes(name)),
		isKnownFormula: vi.fn(async (name: string) => (known.formulas ?? []).includes(name)),
	}
}

describe("parseMasLiteral", () => {
	it("parses AppName::AppID", () => {
		expect(parseMasLiteral("Xcode::497799835")).toEqual({
			ok: true,
			value: mas("Xcode", 497799835),
		})
	})

	it("keeps spaces inside the app name", () => {
		const result = parseMasLiteral("Final Cut Pro::424389933")

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.name).toBe("Final Cut Pro")
			expect(result.value.masId).toBe(424389933)
		}
	})

	it("rejects a non-numeric id", () => {
		const result = parseMasLiteral("Xcode::abc")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("invalid_mas_id")
			expect(result.error.literal).toBe("Xcode::abc")
		}
	})

	it("rejects a zero id and a missing name", () => {
		expect(parseMasLiteral("Xcode::0").ok).toBe(false)
		expect(parseMasLiteral("::497799835").ok).toBe(false)
	})
})

describe("classify", () => {
	it("classifies App Store literals without consulting metadata", async () => {
		const source = metadata({})

		const result = await classify("Xcode::497799835", { metadata: source })

		expect(result).toEqual({ ok: true, value: mas("Xcode", 497799835) })
		expect(source.isKnownCask).not.toHaveBeenCalled()
	})

	it("fails with invalid_mas_id for a bad App Store id", async () => {
		const result = await classify("Xcode::12ab")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("invalid_mas_id")
		}
	})

	it("rejects a kind override on an App Store literal", async () => {
		const result = await classify("Xcode::497799835", { override: "cask" })

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("invalid_mas_id")
		}
	})

	it("honours --cask, --formula and --tap overrides", async () => {
		expect(await classify("firefox", { override: "cask" })).toEqual({
			ok: true,
			value: cask("firefox"),
		})
		expect(await classify("git", { override: "formula" })).toEqual({
			ok: true,
			value: brew("git"),
		})
		expect(await classify("homebrew/cask-fonts", { override: "tap" })).toEqual({
			ok: true,
			value: tap("homebrew/cask-fonts"),
		})
	})

	it("rejects tap names without a slash", async () => {
		const result = await classify("fonts", { override: "tap" })

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_package")
		}
	})

	it("detects casks and formulas through metadata", async () => {
		const source = metadata({ casks: ["firefox"], formulas: ["neovim"] })

		expect(await classify("firefox", { metadata: source })).toEqual({
			ok: true,
			value: cask("firefox"),
		})
		expect(await classify("neovim", { metadata: source })).toEqual({
			ok: true,
			value: brew("neovim"),
		})
	})

	it("fails with unknown_package when metadata knows neither", async () => {
		const result = await classify("not-a-package", { metadata: metadata({}) })

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_package")
			expect(result.error.message).toBe("Unknown package: not-a-package")
		}
	})

	it("fails with unknown_package when a name is both formula and cask", async () => {
		const source = metadata({ casks: ["docker"], formulas: ["docker"] })

		const result = await classify("docker", { metadata: source })

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_package")
			expect(result.error.message).toContain("--formula or --cask")
		}
	})

	it("fails without an override or a metadata source", async () => {
		const result = await classify("git")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_package")
		}
	})

	it("rejects blank literals", async () => {
		const result = await classify("   ")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_package")
		}
	})
})
