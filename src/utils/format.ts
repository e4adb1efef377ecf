class Formatter {

    /**
     * Converts a byte count to mebibytes with two decimals, e.g. 1572864 -> "1.50".
     * @param bytes - The size in bytes.
     */
    public static toMegabytes(bytes: number): string {
        return (bytes / 1024 / 1024).toFixed(2);
    }

    /**
     * Input size divided by output size, or undefined when the output is empty.
     */
    public static compressionRatio(inputBytes: number, outputBytes: number): number | undefined {
        if (outputBytes <= 0) return undefined;
        return inputBytes / outputBytes;
    }

    /**
     * Truncates a string to a specified maximum length and appends an ellipsis if necessary.
     * @param text - The string to truncate.
     * @param maxLength - The maximum length of the string.
     */
    public static truncate(text: string, maxLength: number): string {
        if (text.length <= maxLength) return text;
        return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
    }
}

export default Formatter;
