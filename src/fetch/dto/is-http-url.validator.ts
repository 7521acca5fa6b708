import { buildMessage, ValidateBy, ValidationOptions } from 'class-validator'
import { parseHttpUrl } from '../../common/http-url.util'

export const IS_HTTP_URL = 'isHttpUrl'

/**
 * Accepts any absolute http(s) URL the fetcher can request. No length limit,
 * and underscores are allowed in host names.
 */
export function IsHttpUrl(validationOptions?: ValidationOptions): PropertyDecorator {
    return ValidateBy(
        {
            name: IS_HTTP_URL,
            validator: {
                validate: (value: unknown): boolean =>
                    typeof value === 'string' && parseHttpUrl(value) !== null,
                defaultMessage: buildMessage(
                    (eachPrefix) => `${eachPrefix}$property must be an absolute http(s) URL`,
                    validationOptions,
                ),
            },
        },
        validationOptions,
    )
}
