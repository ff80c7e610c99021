/**
 * Masks credentials in text. `redact` is for log lines: token shapes are
 * replaced outright and `key=value` style assignments keep their key,
 * separator and quoting. `maskTokens` is for published result text and only
 * touches known values and unambiguous token shapes.
 */
export class SecretRedactor {
    static readonly MASK = "***REDACTED***";

    private static readonly TOKEN_PATTERNS: RegExp[] = [
        /Bearer\s+[a-zA-Z0-9\-\._~+/]+=*/gi,
        /Basic\s+[a-zA-Z0-9+/]{16,}=*/g,
        /(?:ghp|gho|ghu|ghs|ghr)_[a-zA-Z0-9]{36}/g,
        /AKIA[0-9A-Z]{16}/g,
        // Azure DevOps personal access tokens (52 chars, base32 alphabet)
        /\b[a-z2-7]{52}\b/g,
        /-----BEGIN [A-Z ]+ PRIVATE KEY-----/g,
    ];

    private static readonly STRICT_TOKEN_PATTERNS: RegExp[] = [
        /\bBearer\s+[a-zA-Z0-9\-\._~+/]{20,}=*/g,
        /(?:ghp|gho|ghu|ghs|ghr)_[a-zA-Z0-9]{36}/g,
        /AKIA[0-9A-Z]{16}/g,
        /\b[a-z2-7]{52}\b/g,
        /-----BEGIN [A-Z ]+ PRIVATE KEY-----/g,
    ];

    // 1: optional quote around the key, 2: key, 3: separator,
    // 4/5: double/single quoted value, 6: bare value
    private static readonly ASSIGNMENT_PATTERN =
        /(["']?)\b(password|pwd|secret|client_secret|token|access_token|auth_token|api_token|api_key|access_key|system_accesstoken|vsts_pat|ado_token)\1\s*([:=])\s*(?:"([^"]+)"|'([^']+)'|([^"'\s,;]+))/gi;

    /**
     * @param knownSecrets exact values to mask wherever they appear, such as
     *   the access token the process was configured with
     */
    static redact(text: string | undefined | null, knownSecrets: readonly string[] = []): string {
        if (!text) return "";
        const redacted = this.mask(text, knownSecrets, this.TOKEN_PATTERNS);

        return redacted.replace(
            this.ASSIGNMENT_PATTERN,
            (_match: string, quote: string, key: string, separator: string, doubleQuoted?: string, singleQuoted?: string) => {
                let value = this.MASK;
                if (doubleQuoted !== undefined) value = `"${this.MASK}"`;
                else if (singleQuoted !== undefined) value = `'${this.MASK}'`;
                return `${quote}${key}${quote}${separator}${value}`;
            }
        );
    }

    /**
     * Masks known values and token shapes that cannot be ordinary prose,
     * leaving assertion text such as `Expected token: abc` untouched.
     */
    static maskTokens(text: string, knownSecrets: readonly string[] = []): string {
        return this.mask(text, knownSecrets, this.STRICT_TOKEN_PATTERNS);
    }

    private static mask(text: string, knownSecrets: readonly string[], patterns: readonly RegExp[]): string {
        let masked = text;
        for (const secret of knownSecrets) {
            if (secret.length < 4) continue;
            masked = masked.split(secret).join(this.MASK);
        }
        for (const pattern of patterns) {
            masked = masked.replace(pattern, this.MASK);
        }
        return masked;
    }
}
