declare module 'html-to-docx' {
  type HtmlToDocxOptions = Record<string, unknown>

  const htmlToDocx: (
    html: string,
    headerHtml?: string | null,
    options?: HtmlToDocxOptions,
    footerHtml?: string | null,
  ) => Promise<Buffer>

  export default htmlToDocx
}
