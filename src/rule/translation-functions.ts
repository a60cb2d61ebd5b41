/**
 * WordPress i18n functions whose last parameter is the text domain.
 */
export const TRANSLATION_FUNCTIONS: ReadonlySet<string> = new Set([
	"__",
	"_e",
	"_x",
	"_n",
	"_nx",
	"esc_html__",
	"esc_html_e",
	"esc_html_x",
	"esc_attr__",
	"esc_attr_e",
	"esc_attr_x",
]);

export function isTranslationFunction(name: string): boolean {
	return TRANSLATION_FUNCTIONS.has(name);
}
