/**
 * Content-Format codes registered for CoAP
 */
export enum ContentFormats {
	text_plain = 0,
	application_cose_encrypt0 = 16,
	application_cose_mac0 = 17,
	application_cose_sign1 = 18,
	application_link_format = 40,
	application_xml = 41,
	application_octet_stream = 42,
	application_exi = 47,
	application_json = 50,
	application_json_patch = 51,
	application_merge_patch = 52,
	application_cbor = 60,
	application_cwt = 61,
	application_senml_json = 110,
	application_sensml_json = 111,
	application_senml_cbor = 112,
	application_sensml_cbor = 113,
}
