import { defineConfig } from "vitepress";

export default defineConfig({
	title: "smtplike",
	description: "Server-side engine for SMTP-style line protocols",
	themeConfig: {
		nav: [
			{ text: "Guide", link: "/guide/getting-started" },
			{ text: "Reference", link: "/reference/protocol" },
		],
		sidebar: [
			{
				text: "Guide",
				items: [
					{ text: "Getting Started", link: "/guide/getting-started" },
					{ text: "Reading a Body", link: "/guide/read-body" },
				],
			},
			{
				text: "Reference",
				items: [
					{ text: "Protocol & Handlers", link: "/reference/protocol" },
					{ text: "Wire Format", link: "/reference/wire-format" },
					{ text: "LineServer", link: "/reference/line-server" },
					{ text: "Errors", link: "/reference/errors" },
				],
			},
		],
		footer: {
			message: "Released under the MIT License.",
		},
	},
});
