import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
    appendProfile,
    ensureStoreFile,
    findStorePath,
    formatProfileBlock,
    getDefaultStorePath,
    getProfileField,
    loadStore,
    parseShellValue,
    parseStoreText,
    readStoreFile,
} from "../../src/store";
import { ProfileError } from "../../src/errors";
import { makeProfile, makeStore } from "../helpers/store";

describe("store format", () => {
    it("formats one block with every field", () => {
        const block = formatProfileBlock(
            makeProfile("my-proxy", { baseUrl: "https://x.example.com/v1", authToken: "test-secret" })
        );
        expect(block).toBe(
            [
                "PROFILE='my-proxy'",
                "MY_PROXY_BASE_URL='https://x.example.com/v1'",
                "MY_PROXY_AUTH_TOKEN='test-secret'",
                "MY_PROXY_MODEL=''",
                "MY_PROXY_SMALL_FAST_MODEL=''",
                "",
                "",
            ].join("\n")
        );
    });

    it("rejects values with line breaks", () => {
        expect(() => formatProfileBlock(makeProfile("a", { model: "x\ny" }))).toThrow(
            "Value for MODEL cannot contain line breaks."
        );
    });

    it("parses shell quoting", () => {
        expect(parseShellValue("'it'\\''s'")).toBe("it's");
        expect(parseShellValue('"a \\"b\\" $c"')).toBe('a "b" $c');
        expect(parseShellValue("plain\\ word")).toBe("plain word");
        expect(parseShellValue("bare  # comment")).toBe("bare");
        expect(parseShellValue("")).toBe("");
    });

    it("rejects broken quoting", () => {
        expect(() => parseShellValue("'open")).toThrow("unterminated single quote");
        expect(() => parseShellValue('"open')).toThrow("unterminated double quote");
        expect(() => parseShellValue("two words")).toThrow("unquoted whitespace in value");
    });

    it("accepts hand-edited files", () => {
        const store = parseStoreText(
            [
                "# my configs",
                "export PROFILE=work",
                'WORK_BASE_URL="https://api.example.com"',
                "WORK_AUTH_TOKEN=test-secret",
                "",
                "PROFILE='work'",
                "WORK_MODEL='model-a'",
                "WORK_MODEL='model-b'",
                "OTHER_MODEL='ignored'",
            ].join("\n")
        );
        expect(store.slugs).toEqual(["work"]);
        expect(store.profiles.get("work")).toEqual({
            slug: "work",
            baseUrl: "https://api.example.com",
            authToken: "test-secret",
            model: "model-b",
            smallFastModel: "",
        });
    });

    it("binds an ambiguous key to the block it appears in", () => {
        const store = parseStoreText(
            [
                "PROFILE=x",
                "X_SMALL_FAST_MODEL=s1",
                "PROFILE=x-small-fast",
                "X_SMALL_FAST_MODEL=m1",
            ].join("\n")
        );
        expect(store.profiles.get("x")?.smallFastModel).toBe("s1");
        expect(store.profiles.get("x")?.model).toBe("");
        expect(store.profiles.get("x-small-fast")?.model).toBe("m1");
        expect(store.profiles.get("x-small-fast")?.smallFastModel).toBe("");
    });

    it("registers hand-written names in identifier form", () => {
        const store = parseStoreText(
            ["PROFILE='My Proxy'", "MY_PROXY_MODEL='model-a'", "PROFILE=my-proxy"].join("\n")
        );
        expect(store.slugs).toEqual(["my-proxy"]);
        expect(store.profiles.get("my-proxy")?.model).toBe("model-a");
    });

    it("skips malformed lines when asked to and keeps every valid block", () => {
        const reported: string[] = [];
        const store = parseStoreText(
            [
                "PROFILE='a'",
                "A_MODEL='model-a'",
                "this line is broken",
                "PROFILE='b'",
                "B_MODEL='open",
                "B_BASE_URL='https://b.example.com'",
            ].join("\n"),
            "configs.env",
            (error) => reported.push(error.message)
        );
        expect(store.slugs).toEqual(["a", "b"]);
        expect(store.profiles.get("a")?.model).toBe("model-a");
        expect(store.profiles.get("b")?.model).toBe("");
        expect(store.profiles.get("b")?.baseUrl).toBe("https://b.example.com");
        expect(reported).toEqual([
            "Malformed line 3 in configs.env",
            "Malformed line 5 in configs.env (unterminated single quote)",
        ]);
    });

    it("reports the line of a malformed statement", () => {
        expect(() => parseStoreText("PROFILE=a\nnot a statement", "configs.env")).toThrow(
            "Malformed line 2 in configs.env"
        );
    });
});

describe("store file", () => {
    let tempDir: string;
    let storePath: string;
    let consoleErrorSpy: MockInstance<typeof console.error>;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "aenv-store-test-"));
        storePath = path.join(tempDir, "anthropic-env", "configs.env");
        consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        consoleErrorSpy.mockRestore();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("loads a missing file as an empty store", () => {
        const store = loadStore(storePath);
        expect(store.slugs).toEqual([]);
        expect(store.profiles.size).toBe(0);
    });

    it("round-trips appended profiles", () => {
        const first = makeProfile("my-proxy", {
            baseUrl: "https://x.example.com/v1",
            authToken: "test-secret",
            model: "model-large",
        });
        const second = makeProfile("quoted", { authToken: `it's $HOME "q"` });
        appendProfile(storePath, first);
        appendProfile(storePath, second);

        const store = readStoreFile(storePath);
        expect(store.slugs).toEqual(["my-proxy", "quoted"]);
        expect(store.profiles.get("my-proxy")).toEqual(first);
        expect(store.profiles.get("quoted")).toEqual(second);
    });

    it("creates the file readable by the owner only", () => {
        // Windows has no POSIX permission bits.
        if (process.platform === "win32") return;
        appendProfile(storePath, makeProfile("a"));
        expect(fs.statSync(storePath).mode & 0o777).toBe(0o600);
    });

    it("appends without touching earlier bytes", () => {
        appendProfile(storePath, makeProfile("a"));
        const before = fs.readFileSync(storePath, "utf8");
        appendProfile(storePath, makeProfile("b"));
        const after = fs.readFileSync(storePath, "utf8");
        expect(after.startsWith(before)).toBe(true);
        expect(after.slice(before.length)).toBe(formatProfileBlock(makeProfile("b")));
    });

    it("starts a new line when the file was left without one", () => {
        fs.mkdirSync(path.dirname(storePath), { recursive: true });
        fs.writeFileSync(storePath, "PROFILE=a", "utf8");
        appendProfile(storePath, makeProfile("b"));
        expect(readStoreFile(storePath).slugs).toEqual(["a", "b"]);
    });

    it("loads around malformed lines with a warning for each", () => {
        fs.mkdirSync(path.dirname(storePath), { recursive: true });
        fs.writeFileSync(storePath, "PROFILE='open\nPROFILE='a'\nnot valid\n", "utf8");

        expect(() => readStoreFile(storePath)).toThrow(ProfileError);
        const store = loadStore(storePath);
        expect(store.slugs).toEqual(["a"]);
        expect(consoleErrorSpy.mock.calls).toEqual([
            [`aenv: warning: Malformed line 1 in ${storePath} (unterminated single quote); skipping it.`],
            [`aenv: warning: Malformed line 3 in ${storePath}; skipping it.`],
        ]);
    });

    it("degrades an unreadable path to an empty store", () => {
        fs.mkdirSync(storePath, { recursive: true });
        expect(loadStore(storePath).slugs).toEqual([]);
        expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it("creates an empty file for editing only once", () => {
        expect(ensureStoreFile(storePath)).toBe(true);
        expect(ensureStoreFile(storePath)).toBe(false);
        expect(readStoreFile(storePath).slugs).toEqual([]);
    });
});

describe("getProfileField", () => {
    const store = makeStore(makeProfile("a", { model: "model-a" }));

    it("returns stored values", () => {
        expect(getProfileField(store, "a", "MODEL")).toBe("model-a");
        expect(getProfileField(store, "a", "SMALL_FAST_MODEL")).toBe("");
    });

    it("returns an empty string for unknown slugs or fields", () => {
        expect(getProfileField(store, "missing", "MODEL")).toBe("");
        expect(getProfileField(store, "a", "COLOR")).toBe("");
    });
});

describe("store path", () => {
    it("lives under XDG_CONFIG_HOME", () => {
        expect(getDefaultStorePath({ XDG_CONFIG_HOME: "/tmp/xdg" })).toBe(
            path.join("/tmp/xdg", "anthropic-env", "configs.env")
        );
    });

    it("falls back to ~/.config", () => {
        expect(getDefaultStorePath({ HOME: "/home/someone" })).toBe(
            path.join("/home/someone", ".config", "anthropic-env", "configs.env")
        );
    });

    it("prefers the flag, then AENV_CONFIG", () => {
        const env = { AENV_CONFIG: "/tmp/from-env.env", XDG_CONFIG_HOME: "/tmp/xdg" };
        expect(findStorePath("/tmp/from-flag.env", env)).toBe("/tmp/from-flag.env");
        expect(findStorePath(null, env)).toBe("/tmp/from-env.env");
    });
});
