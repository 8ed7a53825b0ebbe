import type {ServerResponse} from 'node:http'

export const TEXT_CONTENT_TYPE = 'text/html'
export const JSON_CONTENT_TYPE = 'application/json'

const writeBody = ({
  response,
  status,
  contentType,
  body,
  correlationId
}: {
  response: ServerResponse
  status: number
  contentType: string
  body: Buffer
  correlationId?: string
}) => {
  response.statusCode = status
  response.setHeader('content-type', contentType)
  response.setHeader('content-length', String(body.length))
  if (correlationId) {
    response.setHeader('x-correlation-id', correlationId)
  }

  response.end(body)
}

export const sendJson = ({
  response,
  status,
  payload,
  correlationId
}: {
  response: ServerResponse
  status: number
  payload: unknown
  correlationId?: string
}) => {
  // JSON.stringify yields undefined for an undefined result; send null instead.
  const serialized = JSON.stringify(payload) ?? 'null'
  writeBody({
    response,
    status,
    contentType: JSON_CONTENT_TYPE,
    body: Buffer.from(serialized, 'utf8'),
    ...(correlationId ? {correlationId} : {})
  })
}

export const sendText = ({
  response,
  status,
  text,
  correlationId
}: {
  response: ServerResponse
  status: number
  text: string
  correlationId?: string
}) => {
  writeBody({
    response,
    status,
    contentType: TEXT_CONTENT_TYPE,
    body: Buffer.from(text, 'utf8'),
    ...(correlationId ? {correlationId} : {})
  })
}
