import { load } from "cheerio";
import type { ProbeResponse } from "../scan/types";
import { absoluteUrl, isHtmlContentType } from "../utils";

export interface ScriptTag {
  src: string | null;
  inline: string | null;
  async: boolean;
  defer: boolean;
}

/** Script tags of an HTML response, external sources resolved against the final URL. */
export const extractScripts = (response: ProbeResponse): ScriptTag[] => {
  if (!isHtmlContentType(response.headers["content-type"]) || !response.bodyText.trim()) return [];
  const $ = load(response.bodyText);
  return $("script")
    .toArray()
    .map((element) => {
      const node = $(element);
      const rawSrc = node.attr("src")?.trim();
      const inline = node.html()?.trim() ?? "";
      return {
        src: rawSrc ? absoluteUrl(rawSrc, response.finalUrl) : null,
        inline: !rawSrc && inline ? inline : null,
        async: node.attr("async") !== undefined,
        defer: node.attr("defer") !== undefined,
      };
    });
};
