import { InvalidEnumValueError, InvalidFieldValueError, UnknownFieldError } from "./errors.js";

export const OG_TYPES = [
    "music.song",
    "music.album",
    "music.playlist",
    "music.radio_station",
    "video.movie",
    "video.episode",
    "video.tv_show",
    "video.other",
    "article",
    "book",
    "profile",
    "website",
] as const;

export const TWITTER_CARDS = ["summary", "summary_large_image", "app", "player", "gallery", "product", "lead_generation", "website"] as const;

export type OgType = (typeof OG_TYPES)[number];
export type TwitterCard = (typeof TWITTER_CARDS)[number];

/**
 * SEO and social metadata for a single page.
 *
 * Values are meant to be static, developer-authored strings registered once
 * at startup. They are rendered without HTML escaping, so never build a
 * record from per-request or user-supplied input.
 */
export interface PageMetadata {
    // Basic tags
    readonly title?: string;
    readonly description?: string;
    readonly canonical?: string;

    // Open Graph
    readonly ogType?: OgType;
    readonly ogTitle?: string;
    readonly ogDescription?: string;
    readonly ogImage?: string;
    readonly ogSiteName?: string;
    readonly ogUrl?: string;

    // Twitter Card
    readonly twitterCard?: TwitterCard;
    readonly twitterSite?: string;
    readonly twitterTitle?: string;
    readonly twitterDescription?: string;
    readonly twitterUrl?: string;
    readonly twitterImage?: string;
}

export type MetadataField = keyof PageMetadata;

export type MetadataInput = { -readonly [K in MetadataField]?: PageMetadata[K] };

/**
 * Field name to tag name. Tag names decide the markup template and the
 * order of rendered lines.
 */
export const METADATA_FIELDS: Readonly<Record<MetadataField, string>> = {
    title: "title",
    description: "description",
    canonical: "canonical",
    ogType: "og_type",
    ogTitle: "og_title",
    ogDescription: "og_description",
    ogImage: "og_image",
    ogSiteName: "og_site_name",
    ogUrl: "og_url",
    twitterCard: "twitter_card",
    twitterSite: "twitter_site",
    twitterTitle: "twitter_title",
    twitterDescription: "twitter_description",
    twitterUrl: "twitter_url",
    twitterImage: "twitter_image",
};

const FIELD_NAMES = Object.keys(METADATA_FIELDS);
const OG_TYPE_SET: ReadonlySet<string> = new Set(OG_TYPES);
const TWITTER_CARD_SET: ReadonlySet<string> = new Set(TWITTER_CARDS);
const BLANK = /^[ \t\n\v\f\r]*$/;

export function isMetadataField(name: string): name is MetadataField {
    return Object.prototype.hasOwnProperty.call(METADATA_FIELDS, name);
}

export function isOgType(value: string): value is OgType {
    return OG_TYPE_SET.has(value);
}

export function isTwitterCard(value: string): value is TwitterCard {
    return TWITTER_CARD_SET.has(value);
}

function buildRecord(entries: Iterable<[string, unknown]>): PageMetadata {
    const record: MetadataInput = {};

    for (const [field, value] of entries) {
        if (!isMetadataField(field)) {
            throw new UnknownFieldError(field, FIELD_NAMES);
        }
        if (value === undefined) {
            continue;
        }
        if (typeof value !== "string") {
            throw new InvalidFieldValueError(field, `expected a static string, got ${value === null ? "null" : typeof value}`);
        }
        if (BLANK.test(value)) {
            throw new InvalidFieldValueError(field, "value must not be empty");
        }

        if (field === "ogType") {
            if (!isOgType(value)) {
                throw new InvalidEnumValueError(field, value, OG_TYPES);
            }
            record.ogType = value;
        } else if (field === "twitterCard") {
            if (!isTwitterCard(value)) {
                throw new InvalidEnumValueError(field, value, TWITTER_CARDS);
            }
            record.twitterCard = value;
        } else {
            record[field] = value;
        }
    }

    return Object.freeze(record);
}

/**
 * Create a frozen metadata record.
 *
 * @throws UnknownFieldError for a key that is not a metadata field
 * @throws InvalidEnumValueError for an unsupported `ogType` or `twitterCard`
 * @throws InvalidFieldValueError for a non-string or blank value
 */
export function createMetadata(fields: MetadataInput): PageMetadata {
    return buildRecord(Object.entries(fields));
}

/**
 * Collects fields one by one and validates them in `build()`.
 *
 * ```ts
 * const record = new MetadataBuilder()
 *     .title("Contact us")
 *     .description("Our contact page")
 *     .ogType("website")
 *     .build();
 * ```
 */
export class MetadataBuilder {
    private fields = new Map<string, unknown>();

    /** Untyped setter, validated on build. A field set twice keeps the last value. */
    set(name: string, value: unknown): this {
        this.fields.set(name, value);
        return this;
    }

    title(value: string): this {
        return this.set("title", value);
    }

    description(value: string): this {
        return this.set("description", value);
    }

    canonical(value: string): this {
        return this.set("canonical", value);
    }

    ogType(value: OgType): this {
        return this.set("ogType", value);
    }

    ogTitle(value: string): this {
        return this.set("ogTitle", value);
    }

    ogDescription(value: string): this {
        return this.set("ogDescription", value);
    }

    ogImage(value: string): this {
        return this.set("ogImage", value);
    }

    ogSiteName(value: string): this {
        return this.set("ogSiteName", value);
    }

    ogUrl(value: string): this {
        return this.set("ogUrl", value);
    }

    twitterCard(value: TwitterCard): this {
        return this.set("twitterCard", value);
    }

    twitterSite(value: string): this {
        return this.set("twitterSite", value);
    }

    twitterTitle(value: string): this {
        return this.set("twitterTitle", value);
    }

    twitterDescription(value: string): this {
        return this.set("twitterDescription", value);
    }

    twitterUrl(value: string): this {
        return this.set("twitterUrl", value);
    }

    twitterImage(value: string): this {
        return this.set("twitterImage", value);
    }

    build(): PageMetadata {
        return buildRecord(this.fields.entries());
    }
}
