import { createMetadata, MetadataBuilder, type MetadataInput, type PageMetadata } from "./metadata.js";

export type SEOBuilderFn = (seo: MetadataBuilder) => void;

export type SEODefinition<TPath extends string = string> = {
    __kind: "seo";
    path: TPath;
    metadata: PageMetadata;
};

/**
 * Define the metadata for a static page path.
 *
 * The record is built right away, so an unknown field or an unsupported
 * `ogType`/`twitterCard` fails when the definition is loaded rather than
 * when the page is first requested.
 *
 * ```ts
 * export const home = defineSEO("/", (seo) => {
 *     seo.title("Home").description("Welcome").ogType("website");
 * });
 *
 * export const contact = defineSEO("/contact", { title: "Contact us" });
 * ```
 */
export function defineSEO<TPath extends string>(path: TPath, fields: MetadataInput | SEOBuilderFn): SEODefinition<TPath> {
    if (!path) {
        throw new Error("defineSEO requires a path");
    }
    if (!fields) {
        throw new Error("defineSEO requires metadata fields or a builder function");
    }

    let metadata: PageMetadata;
    if (typeof fields === "function") {
        const builder = new MetadataBuilder();
        fields(builder);
        metadata = builder.build();
    } else {
        metadata = createMetadata(fields);
    }

    return {
        __kind: "seo",
        path,
        metadata,
    };
}
