import { describe, expect, it } from "vitest";

import { defineSEO } from "../../src/server/defineSEO.js";
import { DuplicatePathError, InvalidFieldValueError, InvalidPathError } from "../../src/server/errors.js";
import { createMetadata } from "../../src/server/metadata.js";
import { isStaticPath, requestPath, SEORegistry } from "../../src/server/registry.js";

function createHomeRegistry(): SEORegistry {
    const registry = new SEORegistry({ pad: 2 });
    registry.register("/", {
        title: "some title",
        description: "some description",
        canonical: "some canonical",
        ogType: "website",
        ogTitle: "some title",
        ogDescription: "some description",
        ogImage: "some image",
        ogSiteName: "some site_name",
        ogUrl: "some url",
        twitterCard: "summary",
        twitterSite: "some twitter_site",
        twitterTitle: "some twitter_title",
        twitterDescription: "some twitter_description",
        twitterUrl: "some twitter_url",
        twitterImage: "some twitter_image",
    });
    return registry;
}

const HOME_TAGS = [
    '  <link rel="canonical" href="some canonical" />',
    '  <meta name="description" content="some description" />',
    '  <meta property="og:description" content="some description" />',
    '  <meta property="og:image" content="some image" />',
    '  <meta property="og:site_name" content="some site_name" />',
    '  <meta property="og:title" content="some title" />',
    '  <meta property="og:type" content="website" />',
    '  <meta property="og:url" content="some url" />',
    "  <title>some title</title>",
    '  <meta property="twitter:card" content="summary" />',
    '  <meta property="twitter:description" content="some twitter_description" />',
    '  <meta property="twitter:image" content="some twitter_image" />',
    '  <meta property="twitter:site" content="some twitter_site" />',
    '  <meta property="twitter:title" content="some twitter_title" />',
    '  <meta property="twitter:url" content="some twitter_url" />',
].join("\n");

describe("SEORegistry", () => {
    describe("renderFor", () => {
        it("should render every tag of a registered path", () => {
            const registry = createHomeRegistry();

            expect(registry.renderFor("/", 2)).toEqual({ __kind: "safe-html", html: HOME_TAGS });
        });

        it("should use the registry pad when no indent is given", () => {
            const registry = createHomeRegistry();

            expect(registry.renderFor("/")?.html).toBe(HOME_TAGS);
        });

        it("should return null for an unregistered path", () => {
            const registry = createHomeRegistry();

            expect(registry.renderFor("/bla", 2)).toBeNull();
        });

        it("should tell an unregistered path apart from an empty record", () => {
            const registry = new SEORegistry();
            registry.register("/empty", {});

            expect(registry.renderFor("/empty", 4)).toEqual({ __kind: "safe-html", html: "" });
            expect(registry.renderFor("/missing", 4)).toBeNull();
        });

        it("should default to four spaces", () => {
            const registry = new SEORegistry().register("/", { title: "Home" });

            expect(registry.renderFor("/")?.html).toBe("    <title>Home</title>");
        });
    });

    describe("lookup", () => {
        it("should return the registered record", () => {
            const registry = new SEORegistry().register("/about", { title: "About" });

            expect(registry.lookup("/about")).toEqual({ title: "About" });
        });

        it("should match paths exactly", () => {
            const registry = new SEORegistry().register("/about", { title: "About" });

            expect(registry.lookup("/about/")).toBeNull();
            expect(registry.lookup("/About")).toBeNull();
            expect(registry.lookup("/about?x=1")).toBeNull();
        });

        it("should keep its own frozen copy of the fields", () => {
            const fields = { title: "Before" };
            const registry = new SEORegistry().register("/", fields);
            fields.title = "After";

            expect(registry.lookup("/")?.title).toBe("Before");
            expect(Object.isFrozen(registry.lookup("/"))).toBe(true);
        });

        it("should accept a prebuilt record", () => {
            const record = createMetadata({ ogType: "profile" });
            const registry = new SEORegistry().register("/me", record);

            expect(registry.lookup("/me")).toEqual({ ogType: "profile" });
        });
    });

    describe("register", () => {
        it("should reject a duplicate path", () => {
            const registry = new SEORegistry().register("/", { title: "One" });

            expect(() => registry.register("/", { title: "Two" })).toThrow(DuplicatePathError);
            expect(registry.lookup("/")?.title).toBe("One");
        });

        it("should reject dynamic paths", () => {
            const registry = new SEORegistry();

            expect(() => registry.register("/users/:id", { title: "User" })).toThrow(InvalidPathError);
            expect(() => registry.register("/blog/*slug", { title: "Blog" })).toThrow(InvalidPathError);
            expect(() => registry.register("/tasks/[id]", { title: "Task" })).toThrow(InvalidPathError);
        });

        it("should reject an empty path", () => {
            expect(() => new SEORegistry().register("", { title: "x" })).toThrow('Cannot register metadata for path "": path must not be empty');
        });

        it("should not keep an entry whose fields are invalid", () => {
            const registry = new SEORegistry();

            expect(() => registry.register("/", { title: " \n " })).toThrow(InvalidFieldValueError);
            expect(registry.has("/")).toBe(false);
        });

        it("should register definitions in order", () => {
            const registry = new SEORegistry().registerAll([defineSEO("/b", { title: "B" }), defineSEO("/a", { title: "A" })]);

            expect(registry.paths()).toEqual(["/b", "/a"]);
            expect(registry.size).toBe(2);
        });
    });

    describe("tagsFor", () => {
        it("should use the path component of the request url", () => {
            const registry = createHomeRegistry();
            expect(registry.tagsFor({ url: "/?utm_source=test#top" })?.html).toBe(HOME_TAGS);
        });

        it("should return null when the request path is not registered", () => {
            const registry = createHomeRegistry();
            expect(registry.tagsFor({ url: "/bla" })).toBeNull();
        });
    });

    it("should reject an invalid pad", () => {
        expect(() => new SEORegistry({ pad: -2 })).toThrow(RangeError);
    });
});

describe("requestPath", () => {
    it("should drop query string and fragment", () => {
        expect(requestPath("/docs/intro?tab=1#section")).toBe("/docs/intro");
    });

    it("should not normalize trailing slashes or case", () => {
        expect(requestPath("/Docs/")).toBe("/Docs/");
    });

    it("should default to root", () => {
        expect(requestPath(undefined)).toBe("/");
        expect(requestPath("")).toBe("/");
    });
});

describe("isStaticPath", () => {
    it("should flag dynamic segments", () => {
        expect(isStaticPath("/about")).toBe(true);
        expect(isStaticPath("/users/:id")).toBe(false);
        expect(isStaticPath("/docs/*rest")).toBe(false);
    });
});
