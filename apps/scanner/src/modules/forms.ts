import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export const USERNAME_HINTS = ["username", "email", "login", "user", "userid"];

export type LoginForm = {
  action: string;
  method: string;
  fields: Array<{ type: string; name: string; placeholder: string }>;
};

/** A form with a password input next to something that looks like a username field. */
export const isLoginForm = ($: CheerioAPI, form: Cheerio<Element>) => {
  if (form.find('input[type="password"]').length === 0) return false;
  return form
    .find("input")
    .toArray()
    .some((input) => {
      const node = $(input);
      const haystack = ["name", "placeholder", "id"].map((attr) => (node.attr(attr) ?? "").toLowerCase());
      return USERNAME_HINTS.some((hint) => haystack.some((value) => value.includes(hint)));
    });
};

export const describeLoginForm = ($: CheerioAPI, form: Cheerio<Element>): LoginForm => ({
  action: form.attr("action") ?? "",
  method: (form.attr("method") ?? "GET").toUpperCase(),
  fields: form
    .find("input")
    .toArray()
    .map((input) => {
      const node = $(input);
      return {
        type: (node.attr("type") ?? "text").toLowerCase(),
        name: node.attr("name") ?? "",
        placeholder: node.attr("placeholder") ?? "",
      };
    })
    .filter((field) => ["text", "email", "password", "hidden"].includes(field.type)),
});

export const findLoginForms = ($: CheerioAPI) =>
  $("form")
    .toArray()
    .map((element) => $(element))
    .filter((form) => isLoginForm($, form));
